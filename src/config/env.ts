import { config as loadEnv } from 'dotenv';
import { z } from 'zod';

loadEnv();

const logLevels = [
  'fatal',
  'error',
  'warn',
  'info',
  'debug',
  'trace',
  'silent'
] as const;

const booleanFlag = (defaultValue: 'true' | 'false') =>
  z
    .string()
    .default(defaultValue)
    .transform(value => value === 'true');

const keyList = z
  .string()
  .optional()
  .transform(value =>
    (value ?? '')
      .split(',')
      .map(entry => entry.trim())
      .filter(entry => entry.length > 0)
  );

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(logLevels).default('info'),
  ENCRYPTION_PRIMARY_KEYS: keyList.describe(
    'Comma separated primary key passwords, most recent first'
  ),
  ENCRYPTION_DETERMINISTIC_KEY: z
    .string()
    .optional()
    .describe('Password used to derive the key for deterministic encryption'),
  ENCRYPTION_KEY_DERIVATION_SALT: z
    .string()
    .optional()
    .describe('Salt used for every PBKDF2 key derivation'),
  ENCRYPTION_KEY_DERIVATION_DIGEST: z.enum(['sha256', 'sha1']).default('sha256'),
  ENCRYPTION_SUPPORT_UNENCRYPTED_DATA: booleanFlag('false'),
  ENCRYPTION_EXTEND_QUERIES: booleanFlag('false'),
  ENCRYPTION_STORE_KEY_REFERENCES: booleanFlag('false'),
  ENCRYPTION_ENVELOPE: booleanFlag('false')
});

const parseResult = envSchema.safeParse(process.env);

if (!parseResult.success) {
  const formatted = parseResult.error.flatten();
  const errors = Object.entries(formatted.fieldErrors)
    .map(([field, messages]) => `${field}: ${messages?.join(', ')}`)
    .join('\n');

  throw new Error(`Environment validation failed:\n${errors}`);
}

const data = parseResult.data;

if (data.ENCRYPTION_PRIMARY_KEYS.length > 0 && !data.ENCRYPTION_KEY_DERIVATION_SALT) {
  throw new Error(
    'Environment validation failed:\nENCRYPTION_KEY_DERIVATION_SALT is required when ENCRYPTION_PRIMARY_KEYS is set.'
  );
}

if (data.ENCRYPTION_DETERMINISTIC_KEY && !data.ENCRYPTION_KEY_DERIVATION_SALT) {
  throw new Error(
    'Environment validation failed:\nENCRYPTION_KEY_DERIVATION_SALT is required when ENCRYPTION_DETERMINISTIC_KEY is set.'
  );
}

export const env = {
  ...data,
  isDevelopment: data.NODE_ENV === 'development',
  isProduction: data.NODE_ENV === 'production',
  isTest: data.NODE_ENV === 'test'
};

export type AppEnvironment = typeof env;
