/**
 * Key generation and password-based key derivation.
 *
 * Derivation is PBKDF2 over a fixed, configured salt so the same password
 * always yields the same key. Results are memoized process-wide: PBKDF2 at
 * 2^16 iterations is slow and the result is a pure function of its inputs.
 */

import { createHash, pbkdf2Sync, randomBytes } from 'node:crypto';

import { ConfigurationError } from './errors.js';
import { KEY_LENGTH } from './key.js';
import { logger } from '../lib/logger.js';

export type KeyDerivationDigest = 'sha256' | 'sha1';

export const DEFAULT_KEY_DERIVATION_ITERATIONS = 2 ** 16;

export interface KeyDerivationOptions {
  salt: string;
  digest?: KeyDerivationDigest;
  iterations?: number;
}

/**
 * Fresh secrets for the three configuration values a deployment needs.
 */
export interface GeneratedKeySet {
  primaryKey: string;
  deterministicKey: string;
  keyDerivationSalt: string;
}

const derivedKeyCache = new Map<string, Buffer>();

function cacheKeyFor(
  password: string,
  salt: string,
  digest: KeyDerivationDigest,
  iterations: number,
  length: number
): string {
  // Hashed so passwords are not kept around as map keys
  return createHash('sha256')
    .update(JSON.stringify([digest, iterations, length, salt, password]))
    .digest('hex');
}

export class KeyGenerator {
  readonly salt: string;
  readonly digest: KeyDerivationDigest;
  readonly iterations: number;

  constructor(options: KeyDerivationOptions) {
    if (options.salt.length === 0) {
      throw new ConfigurationError('A key derivation salt is required to derive keys');
    }

    this.salt = options.salt;
    this.digest = options.digest ?? 'sha256';
    this.iterations = options.iterations ?? DEFAULT_KEY_DERIVATION_ITERATIONS;
  }

  generateRandomKey(length: number = KEY_LENGTH): Buffer {
    return randomBytes(length);
  }

  /**
   * Random key as hex. `length` is the number of bytes, the string is twice as long.
   */
  generateRandomHexKey(length: number = KEY_LENGTH): string {
    return this.generateRandomKey(length).toString('hex');
  }

  /**
   * Derive a key of `length` bytes from `password`.
   *
   * A cache miss computes and stores the complete buffer in one synchronous
   * step, so concurrent callers either see nothing or a finished key. Callers
   * get their own copy; zeroizing it leaves the cache intact.
   */
  deriveKeyFrom(password: string, length: number = KEY_LENGTH): Buffer {
    if (password.length === 0) {
      throw new ConfigurationError('Cannot derive a key from an empty password');
    }

    const cacheKey = cacheKeyFor(password, this.salt, this.digest, this.iterations, length);
    let derived = derivedKeyCache.get(cacheKey);

    if (!derived) {
      logger.debug(
        { digest: this.digest, iterations: this.iterations, length },
        'Deriving encryption key'
      );
      derived = pbkdf2Sync(password, this.salt, this.iterations, length, this.digest);
      derivedKeyCache.set(cacheKey, derived);
    }

    return Buffer.from(derived);
  }
}

/**
 * Generate random values for the primary key, deterministic key and salt.
 */
export function generateKeySet(length: number = KEY_LENGTH): GeneratedKeySet {
  const random = () => randomBytes(length).toString('base64url');

  return {
    primaryKey: random(),
    deterministicKey: random(),
    keyDerivationSalt: random()
  };
}

export function clearDerivedKeyCache(): void {
  derivedKeyCache.clear();
}

export function derivedKeyCacheSize(): number {
  return derivedKeyCache.size;
}
