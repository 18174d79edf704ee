/**
 * Error taxonomy for the encryption engine.
 *
 * Every error raised by the engine extends {@link FieldEncryptionError} and
 * carries a `kind` so callers can branch without `instanceof` chains.
 */

export type FieldEncryptionErrorKind = 'configuration' | 'encryption' | 'decryption' | 'protected';

export abstract class FieldEncryptionError extends Error {
  abstract readonly kind: FieldEncryptionErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Invalid or missing key/provider setup. Never retried.
 */
export class ConfigurationError extends FieldEncryptionError {
  readonly kind = 'configuration';
}

/**
 * Failure on the encrypt path, e.g. a provider that yields no key.
 */
export class EncryptionError extends FieldEncryptionError {
  readonly kind = 'encryption';
}

/**
 * Authentication tag mismatch, malformed message, or no candidate key
 * that could open the payload.
 */
export class DecryptionError extends FieldEncryptionError {
  readonly kind = 'decryption';
}

/**
 * Raised when writing while encrypted data is protected.
 */
export class ProtectedEncryptedDataError extends FieldEncryptionError {
  readonly kind = 'protected';
}

export function isFieldEncryptionError(error: unknown): error is FieldEncryptionError {
  return error instanceof FieldEncryptionError;
}
