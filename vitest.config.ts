import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    globals: true,
    env: {
      NODE_ENV: 'test',
      LOG_LEVEL: 'silent',
      ENCRYPTION_PRIMARY_KEYS: 'test-primary-key',
      ENCRYPTION_DETERMINISTIC_KEY: 'test-deterministic-key',
      ENCRYPTION_KEY_DERIVATION_SALT: 'test-derivation-salt',
      ENCRYPTION_SUPPORT_UNENCRYPTED_DATA: 'false',
      ENCRYPTION_STORE_KEY_REFERENCES: 'false',
      ENCRYPTION_ENVELOPE: 'false'
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        'node_modules/',
        'dist/',
        'scripts/',
        '**/*.config.ts',
        '**/*.d.ts',
        'tests/**',
      ],
    },
    // Include TypeScript files
    include: ['tests/**/*.{test,spec}.{ts,tsx}'],
  },
});
