import { asEngineError, defaultCipher, type Aes256GcmCipher } from './cipher.js';
import { DecryptionError, EncryptionError, ProtectedEncryptedDataError } from './errors.js';
import type { KeyProvider } from './key-providers.js';
import { deserializeMessage, isSerializedMessage, serializeMessage } from './message-serializer.js';

export interface EncryptOptions {
  keyProvider: KeyProvider;
  deterministic?: boolean;
}

export interface DecryptOptions {
  keyProvider: KeyProvider;
}

/**
 * Turns clear text into stored text and back.
 */
export interface Encryptor {
  encrypt(clearText: string, options: EncryptOptions): string;
  decrypt(encryptedText: string, options: DecryptOptions): string;
  isEncrypted(text: string): boolean;
}

/**
 * Encrypts with the provider's active key and serializes the resulting
 * message; decrypts by trying the provider's candidate keys.
 */
export class DefaultEncryptor implements Encryptor {
  private readonly cipher: Aes256GcmCipher;

  constructor(cipher: Aes256GcmCipher = defaultCipher) {
    this.cipher = cipher;
  }

  encrypt(clearText: string, { keyProvider, deterministic = false }: EncryptOptions): string {
    try {
      const key = keyProvider.encryptionKey();
      const message = this.cipher
        .encrypt(clearText, { key, deterministic })
        .withHeaders(key.publicTags);

      return serializeMessage(message);
    } catch (error) {
      throw asEngineError(error, EncryptionError, 'Failed to encrypt value');
    }
  }

  decrypt(encryptedText: string, { keyProvider }: DecryptOptions): string {
    try {
      const message = deserializeMessage(encryptedText);
      const keys = keyProvider.decryptionKeys(message);
      if (keys.length === 0) {
        throw new DecryptionError('The key provider returned no decryption keys');
      }

      return this.cipher.decrypt(message, { keys });
    } catch (error) {
      throw asEngineError(error, DecryptionError, 'Failed to decrypt value');
    }
  }

  isEncrypted(text: string): boolean {
    return isSerializedMessage(text);
  }
}

/**
 * Pass-through encryptor: writes store clear text, reads return what is stored.
 */
export class NullEncryptor implements Encryptor {
  encrypt(clearText: string): string {
    return clearText;
  }

  decrypt(encryptedText: string): string {
    return encryptedText;
  }

  isEncrypted(_text: string): boolean {
    return false;
  }
}

/**
 * Decrypts normally but refuses to encrypt, so encrypted columns can be read
 * without risk of being overwritten.
 */
export class ProtectedEncryptor implements Encryptor {
  private readonly inner: Encryptor;

  constructor(inner: Encryptor = defaultEncryptor) {
    this.inner = inner;
  }

  encrypt(): string {
    throw new ProtectedEncryptedDataError(
      "Can't modify encrypted attributes while encrypted data is protected"
    );
  }

  decrypt(encryptedText: string, options: DecryptOptions): string {
    return this.inner.decrypt(encryptedText, options);
  }

  isEncrypted(text: string): boolean {
    return this.inner.isEncrypted(text);
  }
}

export const defaultEncryptor: Encryptor = new DefaultEncryptor();
