import { logger } from '../lib/logger.js';
import { ConfigurationError, DecryptionError } from './errors.js';
import type { EncryptionScheme } from './scheme.js';
import type { AttributeSubtype } from './subtypes.js';

type DecryptAttempt =
  | { ok: true; clearText: string }
  | { ok: false; error: DecryptionError };

/**
 * Connects an encryption scheme with a logical attribute type.
 *
 * Callers hand it logical values and get stored text back (and vice versa);
 * everything about keys, ciphers and fallbacks happens in here.
 */
export class EncryptedAttributeType<T> {
  readonly scheme: EncryptionScheme;
  readonly subtype: AttributeSubtype<T>;

  constructor(scheme: EncryptionScheme, subtype: AttributeSubtype<T>) {
    this.scheme = scheme;
    this.subtype = subtype;
    Object.freeze(this);
  }

  /**
   * Logical value -> stored text. Absent values are never encrypted.
   */
  serialize(value: T | null | undefined): string | null {
    const clearText = this.clearTextFor(this.scheme, value);
    return clearText === null ? null : this.scheme.encrypt(clearText);
  }

  /**
   * Stored text -> logical value.
   *
   * Tries the current scheme, then each previous scheme in order. When all of
   * them fail only the last failure counts: with `supportUnencryptedData` a
   * decryption failure means the stored text is legacy clear text, any other
   * failure is raised.
   */
  deserialize(stored: string | null | undefined): T | null {
    if (stored === null || stored === undefined) {
      return null;
    }

    return this.subtype.cast(this.decrypt(stored));
  }

  /**
   * Whether `newValue` differs from the value behind `oldStored`. Compared
   * as logical values: ciphertext changes on every write.
   */
  changedInPlace(oldStored: string | null | undefined, newValue: T | null | undefined): boolean {
    const oldValue = this.deserialize(oldStored);
    const newClearText = this.clearTextFor(this.scheme, newValue);
    const normalized = newClearText === null ? null : this.subtype.cast(newClearText);

    return !this.subtype.equals(oldValue, normalized);
  }

  isDeterministic(): boolean {
    return this.scheme.deterministic;
  }

  /**
   * Every stored text a deterministic query for `value` has to match: the
   * current scheme's ciphertext, then one per previous deterministic scheme,
   * plus the clear text itself when legacy data is supported and queries are
   * extended. An absent value matches nothing encrypted.
   */
  ciphertextsForQuery(value: T | null | undefined): string[] {
    if (!this.isDeterministic()) {
      throw new ConfigurationError('Only deterministic attributes can be queried by value');
    }

    const candidates: string[] = [];
    const schemes = [this.scheme, ...this.scheme.previousSchemes.filter(s => s.deterministic)];

    for (const scheme of schemes) {
      const clearText = this.clearTextFor(scheme, value);
      if (clearText !== null) {
        candidates.push(scheme.encrypt(clearText));
      }
    }

    const { supportUnencryptedData, extendQueries } = this.scheme.config;
    const currentClearText = this.clearTextFor(this.scheme, value);
    if (supportUnencryptedData && extendQueries && currentClearText !== null) {
      candidates.push(currentClearText);
    }

    return [...new Set(candidates)];
  }

  private clearTextFor(scheme: EncryptionScheme, value: T | null | undefined): string | null {
    const clearText = this.subtype.serialize(value);
    if (clearText === null) {
      return null;
    }
    return scheme.downcase ? clearText.toLowerCase() : clearText;
  }

  private decrypt(stored: string): string {
    const schemes = [this.scheme, ...this.scheme.previousSchemes];
    let lastFailure: DecryptionError | undefined;

    for (const [index, scheme] of schemes.entries()) {
      const attempt = this.tryDecrypt(scheme, stored);

      if (attempt.ok) {
        if (index > 0) {
          logger.debug({ previousScheme: index - 1 }, 'Decrypted with a previous encryption scheme');
        }
        return attempt.clearText;
      }

      lastFailure = attempt.error;
    }

    if (lastFailure && this.scheme.config.supportUnencryptedData) {
      logger.warn(
        { reason: lastFailure.message },
        'Value could not be decrypted; treating it as unencrypted legacy data'
      );
      return stored;
    }

    throw lastFailure ?? new DecryptionError('No encryption scheme could decrypt the value');
  }

  /**
   * Only decryption failures fall through to the next scheme; configuration
   * and protection errors are raised straight away.
   */
  private tryDecrypt(scheme: EncryptionScheme, stored: string): DecryptAttempt {
    try {
      return { ok: true, clearText: scheme.decrypt(stored) };
    } catch (error) {
      if (error instanceof DecryptionError) {
        return { ok: false, error };
      }
      throw error;
    }
  }
}
