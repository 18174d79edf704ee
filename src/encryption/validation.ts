import { z } from 'zod';

import type { EncryptionContextOverrides } from './context.js';
import type { Encryptor } from './encryptor.js';
import type { KeyProvider } from './key-providers.js';
import { DEFAULT_KEY_DERIVATION_ITERATIONS } from './key-generator.js';

/**
 * Validation schemas for engine configuration and scheme declarations
 */

export interface SchemeOptions {
  /** Password to derive this field's key from */
  key?: string;
  keyProvider?: KeyProvider;
  deterministic?: boolean;
  downcase?: boolean;
  /** Schemes tried, in order, when the current one can't decrypt */
  previous?: readonly SchemeOptions[];
  /** Context applied around every encrypt/decrypt of the field */
  context?: EncryptionContextOverrides;
}

export function isKeyProvider(value: unknown): value is KeyProvider {
  return (
    typeof value === 'object' &&
    value !== null &&
    'encryptionKey' in value &&
    typeof value.encryptionKey === 'function' &&
    'decryptionKeys' in value &&
    typeof value.decryptionKeys === 'function'
  );
}

export function isEncryptor(value: unknown): value is Encryptor {
  return (
    typeof value === 'object' &&
    value !== null &&
    'encrypt' in value &&
    typeof value.encrypt === 'function' &&
    'decrypt' in value &&
    typeof value.decrypt === 'function' &&
    'isEncrypted' in value &&
    typeof value.isEncrypted === 'function'
  );
}

export const KeyProviderSchema = z.custom<KeyProvider>(isKeyProvider, {
  message: 'Must implement encryptionKey() and decryptionKeys(message)'
});

export const EncryptorSchema = z.custom<Encryptor>(isEncryptor, {
  message: 'Must implement encrypt(), decrypt() and isEncrypted()'
});

export const ContextOverridesSchema = z
  .object({
    encryptor: EncryptorSchema.optional(),
    keyProvider: KeyProviderSchema.optional()
  })
  .strict();

export const SchemeOptionsSchema: z.ZodType<SchemeOptions> = z.lazy(() =>
  z
    .object({
      key: z.string().min(1).optional(),
      keyProvider: KeyProviderSchema.optional(),
      deterministic: z.boolean().optional(),
      downcase: z.boolean().optional(),
      previous: z.array(SchemeOptionsSchema).optional(),
      context: ContextOverridesSchema.optional()
    })
    .strict()
    .refine(options => !(options.key !== undefined && options.keyProvider !== undefined), {
      message: 'key and keyProvider are mutually exclusive'
    })
);

export const EncryptionConfigSchema = z
  .object({
    primaryKeys: z.array(z.string().min(1)).default([]),
    deterministicKey: z.string().min(1).optional(),
    keyDerivationSalt: z.string().min(1).optional(),
    keyDerivationDigest: z.enum(['sha256', 'sha1']).default('sha256'),
    keyDerivationIterations: z
      .number()
      .int()
      .min(1000)
      .default(DEFAULT_KEY_DERIVATION_ITERATIONS),
    supportUnencryptedData: z.boolean().default(false),
    extendQueries: z.boolean().default(false),
    storeKeyReferences: z.boolean().default(false),
    envelopeEncryption: z.boolean().default(false),
    keyProvider: KeyProviderSchema.optional(),
    previous: z.array(SchemeOptionsSchema).default([])
  })
  .strict()
  .superRefine((config, ctx) => {
    const needsSalt = config.primaryKeys.length > 0 || config.deterministicKey !== undefined;
    if (needsSalt && config.keyDerivationSalt === undefined) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['keyDerivationSalt'],
        message: 'keyDerivationSalt is required to derive keys from passwords'
      });
    }
  });

export type EncryptionConfigOptions = z.input<typeof EncryptionConfigSchema>;

/**
 * Flatten zod issues into `path: message` lines.
 */
export function formatIssues(error: z.ZodError): string {
  return error.issues
    .map(issue => `${issue.path.length > 0 ? issue.path.join('.') : '(root)'}: ${issue.message}`)
    .join('\n');
}
