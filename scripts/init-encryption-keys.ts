#!/usr/bin/env tsx

/**
 * Encryption Key Initializer
 *
 * Prints a fresh set of encryption secrets as environment variables.
 *
 * Usage:
 *   tsx scripts/init-encryption-keys.ts >> .env
 *
 * To rotate the primary key, prepend the new value to ENCRYPTION_PRIMARY_KEYS
 * and keep the old ones after it. The deterministic key and the salt can't be
 * rotated without re-encrypting existing data.
 */

import { generateKeySet } from '../src/encryption/key-generator.js';

const keys = generateKeySet();

process.stdout.write(
  [
    `ENCRYPTION_PRIMARY_KEYS=${keys.primaryKey}`,
    `ENCRYPTION_DETERMINISTIC_KEY=${keys.deterministicKey}`,
    `ENCRYPTION_KEY_DERIVATION_SALT=${keys.keyDerivationSalt}`,
    ''
  ].join('\n')
);
