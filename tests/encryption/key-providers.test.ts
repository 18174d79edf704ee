import { describe, expect, it } from 'vitest';

import { Aes256GcmCipher } from '../../src/encryption/cipher.js';
import { DefaultEncryptor } from '../../src/encryption/encryptor.js';
import { ConfigurationError, DecryptionError } from '../../src/encryption/errors.js';
import { KeyGenerator } from '../../src/encryption/key-generator.js';
import {
  DerivedSecretKeyProvider,
  DeterministicKeyProvider,
  EnvelopeEncryptionKeyProvider,
  StaticKeyProvider
} from '../../src/encryption/key-providers.js';
import { Message } from '../../src/encryption/message.js';
import { deserializeMessage } from '../../src/encryption/message-serializer.js';
import { testKey } from '../helpers/encryption.js';

const keyGenerator = new KeyGenerator({ salt: 'test-derivation-salt', iterations: 1000 });
const emptyMessage = new Message(Buffer.alloc(0));

describe('StaticKeyProvider', () => {
  it('should encrypt with the first key of the list', () => {
    const provider = new StaticKeyProvider([testKey(1), testKey(2)]);

    expect(provider.encryptionKey().secret.equals(testKey(1).secret)).toBe(true);
    expect(provider.encryptionKey().publicTags.encryptedDataKeyId).toBeUndefined();
  });

  it('should offer every key, most recent first, for decryption', () => {
    const provider = new StaticKeyProvider([testKey(1), testKey(2), testKey(3)]);

    const keys = provider.decryptionKeys(emptyMessage);

    expect(keys.map(key => key.secret[0])).toEqual([1, 2, 3]);
  });

  it('should tag the encryption key with its id when storing key references', () => {
    const provider = new StaticKeyProvider([testKey(1), testKey(2)], { storeKeyReferences: true });

    expect(provider.encryptionKey().publicTags.encryptedDataKeyId).toBe(testKey(1).id);
  });

  it('should narrow candidates to the referenced key', () => {
    const provider = new StaticKeyProvider([testKey(1), testKey(2)]);
    const message = new Message(Buffer.alloc(0), { encryptedDataKeyId: testKey(2).id });

    const keys = provider.decryptionKeys(message);

    expect(keys).toHaveLength(1);
    expect(keys[0]?.secret.equals(testKey(2).secret)).toBe(true);
  });

  it('should offer no keys for an unknown key reference', () => {
    const provider = new StaticKeyProvider([testKey(1)]);
    const message = new Message(Buffer.alloc(0), { encryptedDataKeyId: 'zzzz' });

    expect(provider.decryptionKeys(message)).toEqual([]);
  });

  it('should require at least one key', () => {
    expect(() => new StaticKeyProvider([])).toThrow(ConfigurationError);
  });
});

describe('DerivedSecretKeyProvider', () => {
  it('should derive one key per password, in order', () => {
    const provider = new DerivedSecretKeyProvider(['new-password', 'old-password'], { keyGenerator });

    const keys = provider.decryptionKeys(emptyMessage);

    expect(keys).toHaveLength(2);
    expect(keys[0]?.secret.equals(keyGenerator.deriveKeyFrom('new-password'))).toBe(true);
    expect(keys[1]?.secret.equals(keyGenerator.deriveKeyFrom('old-password'))).toBe(true);
    expect(provider.encryptionKey().secret.equals(keyGenerator.deriveKeyFrom('new-password'))).toBe(
      true
    );
  });

  it('should accept a single password', () => {
    const provider = new DerivedSecretKeyProvider('only-password', { keyGenerator });

    expect(provider.decryptionKeys(emptyMessage)).toHaveLength(1);
  });
});

describe('DeterministicKeyProvider', () => {
  it('should accept exactly one password', () => {
    expect(() => new DeterministicKeyProvider(['one'], { keyGenerator })).not.toThrow();
    expect(() => new DeterministicKeyProvider('one', { keyGenerator })).not.toThrow();
  });

  it('should refuse rotation lists', () => {
    expect(() => new DeterministicKeyProvider(['one', 'two'], { keyGenerator })).toThrow(
      "Deterministic encryption keys can't be rotated"
    );
  });
});

describe('EnvelopeEncryptionKeyProvider', () => {
  const encryptor = new DefaultEncryptor();

  it('should generate a fresh data key per encryption', () => {
    const provider = new EnvelopeEncryptionKeyProvider(new StaticKeyProvider([testKey(9)]), {
      keyGenerator
    });

    const first = provider.encryptionKey();
    const second = provider.encryptionKey();

    expect(first.secret.equals(second.secret)).toBe(false);
    expect(first.publicTags.encryptedDataKey).toBeInstanceOf(Message);
  });

  it('should wrap the data key with the primary key', () => {
    const primary = new StaticKeyProvider([testKey(9)]);
    const provider = new EnvelopeEncryptionKeyProvider(primary, { keyGenerator });

    const key = provider.encryptionKey();
    const wrapped = key.publicTags.encryptedDataKey ?? emptyMessage;
    const unwrapped = new Aes256GcmCipher().decrypt(wrapped, { keys: [testKey(9)] });

    expect(Buffer.from(unwrapped, 'base64').equals(key.secret)).toBe(true);
  });

  it('should unwrap the data key from the message as the only candidate', () => {
    const provider = new EnvelopeEncryptionKeyProvider(new StaticKeyProvider([testKey(9)]), {
      keyGenerator
    });

    const stored = encryptor.encrypt('envelope secret', { keyProvider: provider });
    const keys = provider.decryptionKeys(deserializeMessage(stored));

    expect(keys).toHaveLength(1);
    expect(encryptor.decrypt(stored, { keyProvider: provider })).toBe('envelope secret');
  });

  it('should store the wrapped key in the message header', () => {
    const provider = new EnvelopeEncryptionKeyProvider(new StaticKeyProvider([testKey(9)]), {
      keyGenerator
    });

    const stored = encryptor.encrypt('envelope secret', { keyProvider: provider });

    expect(Object.keys(JSON.parse(stored).h)).toEqual(['iv', 'at', 'e', 'k']);
  });

  it('should try every primary key to unwrap after rotation', () => {
    const before = new EnvelopeEncryptionKeyProvider(new StaticKeyProvider([testKey(8)]), {
      keyGenerator
    });
    const after = new EnvelopeEncryptionKeyProvider(
      new StaticKeyProvider([testKey(9), testKey(8)]),
      { keyGenerator }
    );

    const stored = encryptor.encrypt('written before rotation', { keyProvider: before });

    expect(encryptor.decrypt(stored, { keyProvider: after })).toBe('written before rotation');
  });

  it('should use the primary key reference to pick the wrapping key', () => {
    const primary = new StaticKeyProvider([testKey(9), testKey(8)], { storeKeyReferences: true });
    const provider = new EnvelopeEncryptionKeyProvider(primary, { keyGenerator });

    const stored = encryptor.encrypt('referenced', { keyProvider: provider });

    expect(deserializeMessage(stored).headers.encryptedDataKeyId).toBe(testKey(9).id);
    expect(encryptor.decrypt(stored, { keyProvider: provider })).toBe('referenced');
  });

  it('should fail on messages without a wrapped key', () => {
    const provider = new EnvelopeEncryptionKeyProvider(new StaticKeyProvider([testKey(9)]), {
      keyGenerator
    });

    expect(() => provider.decryptionKeys(emptyMessage)).toThrow(DecryptionError);
  });

  it('should fail when no primary key unwraps the data key', () => {
    const writer = new EnvelopeEncryptionKeyProvider(new StaticKeyProvider([testKey(8)]), {
      keyGenerator
    });
    const reader = new EnvelopeEncryptionKeyProvider(new StaticKeyProvider([testKey(9)]), {
      keyGenerator
    });

    const stored = encryptor.encrypt('unreadable', { keyProvider: writer });

    expect(() => encryptor.decrypt(stored, { keyProvider: reader })).toThrow(DecryptionError);
  });
});
