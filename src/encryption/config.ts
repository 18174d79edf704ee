/**
 * Engine configuration.
 *
 * An explicit, immutable object handed to every scheme at construction time;
 * there is no process-wide mutable default. Scoped overrides go through
 * {@link withEncryptionContext} instead.
 */

import { env as defaultEnv, type AppEnvironment } from '../config/index.js';
import { logger } from '../lib/logger.js';
import { ConfigurationError } from './errors.js';
import { KeyGenerator, type KeyDerivationDigest } from './key-generator.js';
import type { KeyProvider } from './key-providers.js';
import {
  EncryptionConfigSchema,
  formatIssues,
  type EncryptionConfigOptions,
  type SchemeOptions
} from './validation.js';

export interface EncryptionConfig {
  /** Primary key passwords, most recent first */
  readonly primaryKeys: readonly string[];
  readonly deterministicKey?: string;
  readonly keyDerivationSalt?: string;
  readonly keyDerivationDigest: KeyDerivationDigest;
  readonly keyDerivationIterations: number;
  /** Treat values that fail to decrypt as legacy clear text */
  readonly supportUnencryptedData: boolean;
  /** Also match clear text in deterministic queries (needs supportUnencryptedData) */
  readonly extendQueries: boolean;
  /** Record the encrypting key id in each message */
  readonly storeKeyReferences: boolean;
  /** Wrap a random data key per value with the primary key */
  readonly envelopeEncryption: boolean;
  /** Default provider for non-deterministic schemes without their own key */
  readonly keyProvider?: KeyProvider;
  /** Previous schemes applied to every compatible scheme */
  readonly previous: readonly SchemeOptions[];
}

export type { EncryptionConfigOptions };

export function createEncryptionConfig(options: EncryptionConfigOptions = {}): EncryptionConfig {
  const result = EncryptionConfigSchema.safeParse(options);

  if (!result.success) {
    const details = formatIssues(result.error);
    logger.error({ details }, 'Invalid encryption configuration');
    throw new ConfigurationError(`Invalid encryption configuration:\n${details}`, {
      cause: result.error
    });
  }

  return Object.freeze({
    ...result.data,
    primaryKeys: Object.freeze([...result.data.primaryKeys]),
    previous: Object.freeze([...result.data.previous])
  });
}

/**
 * Build the configuration from validated environment variables.
 */
export function loadEncryptionConfig(
  source: AppEnvironment = defaultEnv,
  overrides: Partial<EncryptionConfigOptions> = {}
): EncryptionConfig {
  return createEncryptionConfig({
    primaryKeys: source.ENCRYPTION_PRIMARY_KEYS,
    deterministicKey: source.ENCRYPTION_DETERMINISTIC_KEY,
    keyDerivationSalt: source.ENCRYPTION_KEY_DERIVATION_SALT,
    keyDerivationDigest: source.ENCRYPTION_KEY_DERIVATION_DIGEST,
    supportUnencryptedData: source.ENCRYPTION_SUPPORT_UNENCRYPTED_DATA,
    extendQueries: source.ENCRYPTION_EXTEND_QUERIES,
    storeKeyReferences: source.ENCRYPTION_STORE_KEY_REFERENCES,
    envelopeEncryption: source.ENCRYPTION_ENVELOPE,
    ...overrides
  });
}

export function createKeyGenerator(config: EncryptionConfig): KeyGenerator {
  if (config.keyDerivationSalt === undefined) {
    throw new ConfigurationError('keyDerivationSalt is not configured; keys cannot be derived');
  }

  return new KeyGenerator({
    salt: config.keyDerivationSalt,
    digest: config.keyDerivationDigest,
    iterations: config.keyDerivationIterations
  });
}
