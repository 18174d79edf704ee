import { createHash, pbkdf2Sync } from 'node:crypto';
import { beforeEach, describe, expect, it } from 'vitest';

import { ConfigurationError } from '../../src/encryption/errors.js';
import { Key } from '../../src/encryption/key.js';
import {
  clearDerivedKeyCache,
  derivedKeyCacheSize,
  generateKeySet,
  KeyGenerator
} from '../../src/encryption/key-generator.js';

describe('Key', () => {
  it('should expose the first 4 hex characters of the SHA-1 of the secret as id', () => {
    const secret = Buffer.alloc(32, 7);
    const key = new Key(secret);

    expect(key.id).toBe(createHash('sha1').update(secret).digest('hex').slice(0, 4));
    expect(key.id).toMatch(/^[0-9a-f]{4}$/);
  });

  it('should reject secrets that are not 32 bytes', () => {
    expect(() => new Key(Buffer.alloc(16))).toThrow(ConfigurationError);
    expect(() => new Key(Buffer.alloc(33))).toThrow('must be 32 bytes long, got 33');
  });

  it('should return a new key when adding public tags', () => {
    const key = new Key(Buffer.alloc(32, 1));
    const tagged = key.withPublicTags({ encryptedDataKeyId: key.id });

    expect(tagged).not.toBe(key);
    expect(tagged.secret.equals(key.secret)).toBe(true);
    expect(tagged.publicTags.encryptedDataKeyId).toBe(key.id);
    expect(key.publicTags.encryptedDataKeyId).toBeUndefined();
  });

  it('should be frozen', () => {
    expect(Object.isFrozen(new Key(Buffer.alloc(32)))).toBe(true);
  });
});

describe('KeyGenerator', () => {
  beforeEach(() => {
    clearDerivedKeyCache();
  });

  describe('deriveKeyFrom', () => {
    it('should derive a 32-byte key with PBKDF2', () => {
      const generator = new KeyGenerator({ salt: 'salt', iterations: 1000 });

      const key = generator.deriveKeyFrom('pw');

      expect(key.length).toBe(32);
      expect(key.equals(pbkdf2Sync('pw', 'salt', 1000, 32, 'sha256'))).toBe(true);
    });

    it('should default to SHA-256 and 2^16 iterations', () => {
      const generator = new KeyGenerator({ salt: 'salt' });

      expect(generator.digest).toBe('sha256');
      expect(generator.iterations).toBe(65536);
    });

    it('should derive different keys for different digests', () => {
      const sha256 = new KeyGenerator({ salt: 'salt', iterations: 1000 });
      const sha1 = new KeyGenerator({ salt: 'salt', iterations: 1000, digest: 'sha1' });

      expect(sha256.deriveKeyFrom('pw').equals(sha1.deriveKeyFrom('pw'))).toBe(false);
      expect(sha1.deriveKeyFrom('pw').equals(pbkdf2Sync('pw', 'salt', 1000, 32, 'sha1'))).toBe(true);
    });

    it('should derive different keys for different salts', () => {
      const first = new KeyGenerator({ salt: 'salt-a', iterations: 1000 });
      const second = new KeyGenerator({ salt: 'salt-b', iterations: 1000 });

      expect(first.deriveKeyFrom('pw').equals(second.deriveKeyFrom('pw'))).toBe(false);
    });

    it('should memoize derivations across generators', () => {
      const first = new KeyGenerator({ salt: 'salt', iterations: 1000 });
      const second = new KeyGenerator({ salt: 'salt', iterations: 1000 });

      first.deriveKeyFrom('pw');
      second.deriveKeyFrom('pw');
      expect(derivedKeyCacheSize()).toBe(1);

      first.deriveKeyFrom('other');
      expect(derivedKeyCacheSize()).toBe(2);
    });

    it('should hand out copies so zeroizing one leaves the cache intact', () => {
      const generator = new KeyGenerator({ salt: 'salt', iterations: 1000 });

      const first = generator.deriveKeyFrom('pw');
      first.fill(0);
      const second = generator.deriveKeyFrom('pw');

      expect(second.equals(pbkdf2Sync('pw', 'salt', 1000, 32, 'sha256'))).toBe(true);
    });

    it('should reject empty passwords', () => {
      const generator = new KeyGenerator({ salt: 'salt', iterations: 1000 });

      expect(() => generator.deriveKeyFrom('')).toThrow(ConfigurationError);
    });
  });

  it('should require a salt', () => {
    expect(() => new KeyGenerator({ salt: '' })).toThrow(ConfigurationError);
  });

  it('should generate unique random keys', () => {
    const generator = new KeyGenerator({ salt: 'salt' });

    const key1 = generator.generateRandomKey();
    const key2 = generator.generateRandomKey();

    expect(key1.length).toBe(32);
    expect(key1.equals(key2)).toBe(false);
  });

  it('should generate hex keys twice as long as their byte length', () => {
    const generator = new KeyGenerator({ salt: 'salt' });

    expect(generator.generateRandomHexKey()).toMatch(/^[0-9a-f]{64}$/);
    expect(generator.generateRandomHexKey(16)).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe('generateKeySet', () => {
  it('should generate three distinct base64url secrets', () => {
    const keys = generateKeySet();

    for (const value of [keys.primaryKey, keys.deterministicKey, keys.keyDerivationSalt]) {
      expect(value).toMatch(/^[A-Za-z0-9_-]{43}$/);
    }
    expect(new Set([keys.primaryKey, keys.deterministicKey, keys.keyDerivationSalt]).size).toBe(3);
  });
});
