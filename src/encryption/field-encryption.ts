import { loadEncryptionConfig, type EncryptionConfig } from './config.js';
import { EncryptedAttributeType } from './encrypted-attribute-type.js';
import { EncryptionScheme, type SchemeOptions } from './scheme.js';
import { StringSubtype, type AttributeSubtype } from './subtypes.js';

/**
 * Entry point bound to one configuration: builds schemes and encrypted
 * attribute types for the fields a caller declares.
 */
export class FieldEncryption {
  readonly config: EncryptionConfig;

  constructor(config: EncryptionConfig = loadEncryptionConfig()) {
    this.config = config;
  }

  scheme(options: SchemeOptions = {}): EncryptionScheme {
    return new EncryptionScheme(options, this.config);
  }

  attribute(options?: SchemeOptions): EncryptedAttributeType<string>;
  attribute<T>(options: SchemeOptions, subtype: AttributeSubtype<T>): EncryptedAttributeType<T>;
  attribute<T>(
    options: SchemeOptions = {},
    subtype?: AttributeSubtype<T>
  ): EncryptedAttributeType<T> | EncryptedAttributeType<string> {
    const scheme = this.scheme(options);
    return subtype
      ? new EncryptedAttributeType(scheme, subtype)
      : new EncryptedAttributeType(scheme, StringSubtype);
  }
}
