/**
 * AES-256-GCM cipher.
 *
 * Non-deterministic mode uses a random 96-bit IV. Deterministic mode derives
 * the IV from HMAC-SHA-256(secret, clear text), so the same key and clear
 * text always produce the same ciphertext while remaining authenticated.
 */

import { createCipheriv, createDecipheriv, createHmac, randomBytes } from 'node:crypto';

import { DecryptionError, EncryptionError, isFieldEncryptionError } from './errors.js';
import type { Key } from './key.js';
import { Message } from './message.js';

// AES-256-GCM parameters
const ALGORITHM = 'aes-256-gcm';
export const IV_LENGTH = 12; // 96 bits (recommended for GCM)
export const AUTH_TAG_LENGTH = 16; // 128 bits
const ENCODING = 'utf-8';

export interface CipherEncryptOptions {
  key: Key;
  deterministic?: boolean;
}

export interface CipherDecryptOptions {
  /** Candidate keys, tried in order */
  keys: readonly Key[];
}

function generateIv(key: Key, clearText: Buffer, deterministic: boolean): Buffer {
  if (deterministic) {
    return createHmac('sha256', key.secret).update(clearText).digest().subarray(0, IV_LENGTH);
  }

  return randomBytes(IV_LENGTH);
}

export class Aes256GcmCipher {
  encrypt(clearText: string, { key, deterministic = false }: CipherEncryptOptions): Message {
    const data = Buffer.from(clearText, ENCODING);

    try {
      const iv = generateIv(key, data, deterministic);
      const cipher = createCipheriv(ALGORITHM, key.secret, iv, { authTagLength: AUTH_TAG_LENGTH });
      const payload = Buffer.concat([cipher.update(data), cipher.final()]);

      return new Message(payload, { iv, authTag: cipher.getAuthTag(), encoding: ENCODING });
    } catch (error) {
      throw new EncryptionError('AES-256-GCM encryption failed', { cause: error });
    }
  }

  /**
   * Decrypt with the first candidate key whose authentication tag verifies.
   * Every candidate is tried before giving up.
   */
  decrypt(message: Message, { keys }: CipherDecryptOptions): string {
    const { iv, authTag, encoding } = message.headers;

    if (!iv || iv.length !== IV_LENGTH) {
      throw new DecryptionError('Message has a missing or invalid initialization vector');
    }
    if (!authTag || authTag.length !== AUTH_TAG_LENGTH) {
      throw new DecryptionError('Message has a missing or truncated authentication tag');
    }
    if (encoding !== undefined && encoding !== ENCODING) {
      throw new DecryptionError(`Unsupported clear text encoding "${encoding}"`);
    }
    if (keys.length === 0) {
      throw new DecryptionError('No decryption keys available for this message');
    }

    let lastError: unknown;
    for (const key of keys) {
      try {
        return this.decryptWith(message.payload, key, iv, authTag);
      } catch (error) {
        lastError = error;
      }
    }

    throw new DecryptionError('None of the candidate keys could decrypt the message', {
      cause: lastError
    });
  }

  private decryptWith(payload: Buffer, key: Key, iv: Buffer, authTag: Buffer): string {
    const decipher = createDecipheriv(ALGORITHM, key.secret, iv, {
      authTagLength: AUTH_TAG_LENGTH
    });
    decipher.setAuthTag(authTag);

    const clear = Buffer.concat([decipher.update(payload), decipher.final()]);
    return new TextDecoder(ENCODING, { fatal: true }).decode(clear);
  }
}

/**
 * Wrap unknown failures from crypto primitives or custom providers in the
 * engine's taxonomy; engine errors pass through untouched.
 */
export function asEngineError(
  error: unknown,
  Wrapper: typeof EncryptionError | typeof DecryptionError,
  message: string
): Error {
  if (isFieldEncryptionError(error)) {
    return error;
  }

  return new Wrapper(message, { cause: error });
}

export const defaultCipher = new Aes256GcmCipher();
