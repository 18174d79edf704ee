import { createEncryptionConfig, type EncryptionConfig, type EncryptionConfigOptions } from '../../src/encryption/config.js';
import { Key } from '../../src/encryption/key.js';
import type { KeyProvider } from '../../src/encryption/key-providers.js';

/**
 * Configuration used across encryption tests. Fewer PBKDF2 iterations than
 * the default keep derivation fast.
 */
export function testConfig(overrides: EncryptionConfigOptions = {}): EncryptionConfig {
  return createEncryptionConfig({
    primaryKeys: ['test-primary-key'],
    deterministicKey: 'test-deterministic-key',
    keyDerivationSalt: 'test-derivation-salt',
    keyDerivationIterations: 1000,
    ...overrides
  });
}

/**
 * A key whose 32 bytes are all `fill`.
 */
export function testKey(fill: number): Key {
  return new Key(Buffer.alloc(32, fill));
}

/**
 * Provider whose every call throws `error`.
 */
export class FailingKeyProvider implements KeyProvider {
  private readonly error: Error;

  constructor(error: Error) {
    this.error = error;
  }

  encryptionKey(): Key {
    throw this.error;
  }

  decryptionKeys(): readonly Key[] {
    throw this.error;
  }
}

export function captureError(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  throw new Error('Expected function to throw');
}
