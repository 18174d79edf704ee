/**
 * Key providers supply the key for new encryptions and the ordered list of
 * candidate keys for decrypting a given message.
 *
 * Rotation lists are kept most recent first: the first key encrypts, and
 * every key is tried, in order, on decrypt.
 */

import { defaultCipher, type Aes256GcmCipher } from './cipher.js';
import { ConfigurationError, DecryptionError } from './errors.js';
import { Key } from './key.js';
import type { KeyGenerator } from './key-generator.js';
import { Message } from './message.js';

export interface KeyProvider {
  /** Key used for new encryptions */
  encryptionKey(): Key;
  /** Candidate keys for `message`, in the order they must be tried */
  decryptionKeys(message: Message): readonly Key[];
}

export interface StaticKeyProviderOptions {
  /** Record the id of the encrypting key in each message */
  storeKeyReferences?: boolean;
}

/**
 * Fixed rotation list of keys.
 */
export class StaticKeyProvider implements KeyProvider {
  private readonly keys: readonly Key[];
  private readonly activeKey: Key;

  constructor(keys: readonly Key[], options: StaticKeyProviderOptions = {}) {
    const [first] = keys;
    if (!first) {
      throw new ConfigurationError('A key provider needs at least one key');
    }

    this.keys = Object.freeze([...keys]);
    this.activeKey = options.storeKeyReferences
      ? first.withPublicTags({ encryptedDataKeyId: first.id })
      : first;
  }

  encryptionKey(): Key {
    return this.activeKey;
  }

  decryptionKeys(message: Message): readonly Key[] {
    const keyId = message.headers.encryptedDataKeyId;
    if (keyId === undefined) {
      return this.keys;
    }

    return this.keys.filter(key => key.id === keyId);
  }
}

export interface DerivedSecretKeyProviderOptions extends StaticKeyProviderOptions {
  keyGenerator: KeyGenerator;
}

/**
 * Keys derived from passwords (PBKDF2 over the configured salt).
 */
export class DerivedSecretKeyProvider extends StaticKeyProvider {
  constructor(passwords: string | readonly string[], options: DerivedSecretKeyProviderOptions) {
    const list = typeof passwords === 'string' ? [passwords] : passwords;
    super(
      list.map(password => new Key(options.keyGenerator.deriveKeyFrom(password))),
      options
    );
  }
}

/**
 * Single derived key for deterministic encryption. Deterministic keys can't
 * be rotated: rotating them would break equality queries.
 */
export class DeterministicKeyProvider extends DerivedSecretKeyProvider {
  constructor(password: string | readonly string[], options: DerivedSecretKeyProviderOptions) {
    if (typeof password !== 'string' && password.length !== 1) {
      throw new ConfigurationError("Deterministic encryption keys can't be rotated");
    }
    super(password, options);
  }
}

export interface EnvelopeEncryptionKeyProviderOptions {
  keyGenerator: KeyGenerator;
  cipher?: Aes256GcmCipher;
}

/**
 * Envelope encryption: every encryption uses a fresh random data key which
 * is wrapped with the primary key and stored in the message header.
 */
export class EnvelopeEncryptionKeyProvider implements KeyProvider {
  private readonly primaryKeyProvider: KeyProvider;
  private readonly keyGenerator: KeyGenerator;
  private readonly cipher: Aes256GcmCipher;

  constructor(primaryKeyProvider: KeyProvider, options: EnvelopeEncryptionKeyProviderOptions) {
    this.primaryKeyProvider = primaryKeyProvider;
    this.keyGenerator = options.keyGenerator;
    this.cipher = options.cipher ?? defaultCipher;
  }

  encryptionKey(): Key {
    const primaryKey = this.primaryKeyProvider.encryptionKey();
    const dataKey = this.keyGenerator.generateRandomKey();
    const encryptedDataKey = this.cipher.encrypt(dataKey.toString('base64'), { key: primaryKey });

    return new Key(dataKey, {
      encryptedDataKey,
      encryptedDataKeyId: primaryKey.publicTags.encryptedDataKeyId
    });
  }

  decryptionKeys(message: Message): readonly Key[] {
    const encryptedDataKey = message.headers.encryptedDataKey;
    if (!encryptedDataKey) {
      throw new DecryptionError('Message has no encrypted data key');
    }

    // The primary key id travels on the outer message
    const lookup = new Message(encryptedDataKey.payload, {
      ...encryptedDataKey.headers,
      encryptedDataKeyId: message.headers.encryptedDataKeyId
    });
    const primaryKeys = this.primaryKeyProvider.decryptionKeys(lookup);
    const dataKey = this.cipher.decrypt(encryptedDataKey, { keys: primaryKeys });

    return [new Key(Buffer.from(dataKey, 'base64'))];
  }
}
