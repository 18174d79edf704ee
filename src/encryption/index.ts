/**
 * Encryption module - per-field encryption engine
 *
 * AES-256-GCM messages, rotating and envelope key providers, immutable
 * per-field schemes and scoped encryption contexts.
 */

export {
  // Errors
  FieldEncryptionError,
  ConfigurationError,
  EncryptionError,
  DecryptionError,
  ProtectedEncryptedDataError,
  isFieldEncryptionError,
  type FieldEncryptionErrorKind
} from './errors.js';

export { Key, KEY_LENGTH, type KeyPublicTags } from './key.js';

export {
  KeyGenerator,
  generateKeySet,
  clearDerivedKeyCache,
  DEFAULT_KEY_DERIVATION_ITERATIONS,
  type GeneratedKeySet,
  type KeyDerivationDigest,
  type KeyDerivationOptions
} from './key-generator.js';

export { Message, type MessageHeaders } from './message.js';
export { serializeMessage, deserializeMessage, isSerializedMessage } from './message-serializer.js';
export { Aes256GcmCipher, IV_LENGTH, AUTH_TAG_LENGTH } from './cipher.js';

export {
  StaticKeyProvider,
  DerivedSecretKeyProvider,
  DeterministicKeyProvider,
  EnvelopeEncryptionKeyProvider,
  type KeyProvider
} from './key-providers.js';

export {
  DefaultEncryptor,
  NullEncryptor,
  ProtectedEncryptor,
  defaultEncryptor,
  type Encryptor,
  type EncryptOptions,
  type DecryptOptions
} from './encryptor.js';

export {
  withEncryptionContext,
  withoutEncryption,
  protectingEncryptedData,
  currentEncryptionContext,
  type EncryptionContext,
  type EncryptionContextOverrides
} from './context.js';

export {
  createEncryptionConfig,
  loadEncryptionConfig,
  createKeyGenerator,
  type EncryptionConfig,
  type EncryptionConfigOptions
} from './config.js';

export { EncryptionScheme, type SchemeOptions } from './scheme.js';

export {
  StringSubtype,
  IntegerSubtype,
  FloatSubtype,
  BooleanSubtype,
  JsonSubtype,
  type AttributeSubtype,
  type JsonValue
} from './subtypes.js';

export { EncryptedAttributeType } from './encrypted-attribute-type.js';
export { FieldEncryption } from './field-encryption.js';
