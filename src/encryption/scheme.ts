import { createKeyGenerator, type EncryptionConfig } from './config.js';
import {
  currentEncryptionContext,
  withEncryptionContext,
  type EncryptionContext
} from './context.js';
import { defaultEncryptor, type Encryptor } from './encryptor.js';
import { ConfigurationError } from './errors.js';
import {
  DerivedSecretKeyProvider,
  DeterministicKeyProvider,
  EnvelopeEncryptionKeyProvider,
  type KeyProvider
} from './key-providers.js';
import { formatIssues, SchemeOptionsSchema, type SchemeOptions } from './validation.js';

export type { SchemeOptions };

interface SchemeBuildOptions {
  /** Prepend the config's global previous schemes (only for top level schemes) */
  includeGlobalPrevious: boolean;
}

function validateSchemeOptions(options: SchemeOptions): SchemeOptions {
  const result = SchemeOptionsSchema.safeParse(options);
  if (!result.success) {
    throw new ConfigurationError(`Invalid encryption scheme:\n${formatIssues(result.error)}`, {
      cause: result.error
    });
  }
  return result.data;
}

/**
 * Options for a previous scheme: its own settings layered over the current
 * scheme's. Declaring either `key` or `keyProvider` replaces both.
 */
function mergeSchemeOptions(current: SchemeOptions, previous: SchemeOptions): SchemeOptions {
  const base: SchemeOptions = { ...current };
  delete base.previous;
  if (previous.key !== undefined || previous.keyProvider !== undefined) {
    delete base.key;
    delete base.keyProvider;
  }
  return { ...base, ...previous };
}

function defaultKeyProvider(config: EncryptionConfig): KeyProvider {
  if (config.keyProvider) {
    return config.keyProvider;
  }

  if (config.primaryKeys.length === 0) {
    throw new ConfigurationError(
      'No primary keys configured. Set primaryKeys or provide a key provider.'
    );
  }

  const keyGenerator = createKeyGenerator(config);
  const primary = new DerivedSecretKeyProvider(config.primaryKeys, {
    keyGenerator,
    storeKeyReferences: config.storeKeyReferences
  });

  return config.envelopeEncryption
    ? new EnvelopeEncryptionKeyProvider(primary, { keyGenerator })
    : primary;
}

function resolveKeyProvider(options: SchemeOptions, config: EncryptionConfig): KeyProvider {
  if (options.keyProvider) {
    return options.keyProvider;
  }

  if (options.key !== undefined) {
    return new DerivedSecretKeyProvider(options.key, {
      keyGenerator: createKeyGenerator(config),
      storeKeyReferences: config.storeKeyReferences
    });
  }

  if (options.deterministic) {
    if (config.deterministicKey === undefined) {
      throw new ConfigurationError(
        'Deterministic encryption needs deterministicKey to be configured'
      );
    }
    return new DeterministicKeyProvider(config.deterministicKey, {
      keyGenerator: createKeyGenerator(config),
      storeKeyReferences: config.storeKeyReferences
    });
  }

  return defaultKeyProvider(config);
}

/**
 * Immutable description of how one field is encrypted. Built once at
 * configuration time and shared read-only by every operation on the field.
 */
export class EncryptionScheme {
  readonly keyProvider: KeyProvider;
  readonly deterministic: boolean;
  readonly downcase: boolean;
  readonly context?: EncryptionContext;
  /** Tried in order when this scheme can't decrypt a value */
  readonly previousSchemes: readonly EncryptionScheme[];
  readonly config: EncryptionConfig;

  constructor(
    options: SchemeOptions,
    config: EncryptionConfig,
    build: SchemeBuildOptions = { includeGlobalPrevious: true }
  ) {
    const declared = validateSchemeOptions(options);

    this.config = config;
    this.deterministic = declared.deterministic ?? false;
    this.downcase = declared.downcase ?? false;
    this.context = declared.context ? Object.freeze({ ...declared.context }) : undefined;
    this.keyProvider = resolveKeyProvider(declared, config);

    const globalPrevious = build.includeGlobalPrevious
      ? config.previous.filter(previous => (previous.deterministic ?? false) === this.deterministic)
      : [];

    this.previousSchemes = Object.freeze(
      [...globalPrevious, ...(declared.previous ?? [])].map(
        previous =>
          new EncryptionScheme(mergeSchemeOptions(declared, previous), config, {
            includeGlobalPrevious: false
          })
      )
    );

    Object.freeze(this);
  }

  /**
   * Encrypt with the active encryptor and key provider. The scheme's own
   * context is applied innermost; any active context overrides the scheme's
   * key provider.
   */
  encrypt(clearText: string): string {
    return this.withContext(() => {
      const { encryptor, keyProvider } = this.resolve();
      return encryptor.encrypt(clearText, { keyProvider, deterministic: this.deterministic });
    });
  }

  decrypt(encryptedText: string): string {
    return this.withContext(() => {
      const { encryptor, keyProvider } = this.resolve();
      return encryptor.decrypt(encryptedText, { keyProvider });
    });
  }

  isEncrypted(text: string): boolean {
    return this.withContext(() => this.resolve().encryptor.isEncrypted(text));
  }

  private resolve(): { encryptor: Encryptor; keyProvider: KeyProvider } {
    const context = currentEncryptionContext();
    return {
      encryptor: context.encryptor ?? defaultEncryptor,
      keyProvider: context.keyProvider ?? this.keyProvider
    };
  }

  private withContext<T>(body: () => T): T {
    return this.context ? withEncryptionContext(this.context, body) : body();
  }
}
