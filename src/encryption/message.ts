import { EncryptionError } from './errors.js';

/**
 * Unencrypted headers travelling with a payload.
 */
export interface MessageHeaders {
  /** Initialization vector (12 bytes for AES-GCM) */
  iv?: Buffer;
  /** GCM authentication tag (16 bytes) */
  authTag?: Buffer;
  /** Wrapped data key, envelope mode only */
  encryptedDataKey?: Message;
  /** Short id of the key that encrypted the payload (or wrapped the data key) */
  encryptedDataKeyId?: string;
  /** Character encoding of the clear text */
  encoding?: string;
}

export type MessageHeaderName = keyof MessageHeaders;

const HEADER_NAMES: readonly MessageHeaderName[] = [
  'iv',
  'authTag',
  'encryptedDataKey',
  'encryptedDataKeyId',
  'encoding'
];

function copyHeader<K extends MessageHeaderName>(
  target: MessageHeaders,
  source: MessageHeaders,
  name: K
): void {
  const value = source[name];
  if (value !== undefined) {
    target[name] = value;
  }
}

/**
 * Ciphertext payload plus the headers needed to open it. Self-describing:
 * decrypting only requires a key provider.
 */
export class Message {
  readonly payload: Buffer;
  readonly headers: Readonly<MessageHeaders>;

  constructor(payload: Buffer, headers: MessageHeaders = {}) {
    this.payload = payload;
    this.headers = Object.freeze({ ...headers });
    Object.freeze(this);
  }

  /**
   * Returns a copy with extra headers. Existing headers are never replaced.
   */
  withHeaders(extra: MessageHeaders): Message {
    const merged: MessageHeaders = { ...this.headers };

    for (const name of HEADER_NAMES) {
      if (extra[name] === undefined) {
        continue;
      }
      if (this.headers[name] !== undefined) {
        throw new EncryptionError(`Message header "${name}" is already set and can't be overridden`);
      }
      copyHeader(merged, extra, name);
    }

    return new Message(this.payload, merged);
  }
}
