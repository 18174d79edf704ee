import { createHash } from 'node:crypto';

import { ConfigurationError } from './errors.js';
import type { Message } from './message.js';

// AES-256
export const KEY_LENGTH = 32;

/**
 * Tags a key exposes in clear text; merged into the headers of every
 * message the key encrypts.
 */
export interface KeyPublicTags {
  encryptedDataKey?: Message;
  encryptedDataKeyId?: string;
}

/**
 * A secret used to encrypt and decrypt data, plus public tags.
 */
export class Key {
  readonly secret: Buffer;
  readonly publicTags: Readonly<KeyPublicTags>;

  constructor(secret: Buffer, publicTags: KeyPublicTags = {}) {
    if (secret.length !== KEY_LENGTH) {
      throw new ConfigurationError(
        `Encryption keys must be ${KEY_LENGTH} bytes long, got ${secret.length}`
      );
    }

    this.secret = secret;
    this.publicTags = Object.freeze({ ...publicTags });
    Object.freeze(this);
  }

  /**
   * Short identifier stored in messages when key references are enabled.
   * First 4 hex characters of the SHA-1 of the secret.
   */
  get id(): string {
    return createHash('sha1').update(this.secret).digest('hex').slice(0, 4);
  }

  withPublicTags(tags: KeyPublicTags): Key {
    return new Key(this.secret, { ...this.publicTags, ...tags });
  }
}
