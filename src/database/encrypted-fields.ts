/**
 * Mongoose plugin for encrypted fields.
 *
 * Listed paths store ciphertext (they must be declared as String) and expose
 * the logical value through a getter:
 *
 *   CustomerSchema.plugin(encryptedFieldsPlugin, {
 *     encryption,
 *     fields: {
 *       email: { deterministic: true, downcase: true },
 *       notes: {}
 *     }
 *   });
 *
 * Setters are skipped on query filters; use {@link encryptedQueryValues} to
 * match deterministic fields across current and previous schemes.
 */

import { Query, type Schema } from 'mongoose';

import { logger } from '../lib/logger.js';
import type { EncryptedAttributeType } from '../encryption/encrypted-attribute-type.js';
import { ConfigurationError, DecryptionError, EncryptionError } from '../encryption/errors.js';
import type { FieldEncryption } from '../encryption/field-encryption.js';
import type { SchemeOptions } from '../encryption/scheme.js';
import {
  BooleanSubtype,
  FloatSubtype,
  IntegerSubtype,
  StringSubtype
} from '../encryption/subtypes.js';

export type EncryptedFieldType = 'string' | 'integer' | 'float' | 'boolean';

export interface EncryptedFieldDeclaration extends SchemeOptions {
  /** Logical type of the field (defaults to string) */
  type?: EncryptedFieldType;
}

export interface EncryptedFieldsPluginOptions {
  encryption: FieldEncryption;
  fields: Record<string, EncryptedFieldDeclaration>;
}

/**
 * Type-erased view of an encrypted attribute, as seen from mongoose.
 */
interface FieldCodec {
  serialize(value: unknown): string | null;
  deserialize(stored: unknown): unknown;
  changedInPlace(oldStored: unknown, value: unknown): boolean;
  queryValues(value: unknown): string[];
}

const codecsBySchema = new WeakMap<Schema, Map<string, FieldCodec>>();

function storedText(path: string, stored: unknown): string | null {
  if (stored === null || stored === undefined) {
    return null;
  }
  if (typeof stored !== 'string') {
    throw new DecryptionError(`Stored value of "${path}" is not text`);
  }
  return stored;
}

function createCodec<T>(
  path: string,
  attribute: EncryptedAttributeType<T>,
  coerce: (value: unknown) => T | undefined
): FieldCodec {
  const logical = (value: unknown): T | null => {
    if (value === null || value === undefined) {
      return null;
    }
    const coerced = coerce(value);
    if (coerced === undefined) {
      throw new EncryptionError(`Value of "${path}" is not a valid ${attribute.subtype.name}`);
    }
    return coerced;
  };

  return {
    serialize: value => attribute.serialize(logical(value)),
    deserialize: stored => attribute.deserialize(storedText(path, stored)),
    changedInPlace: (oldStored, value) =>
      attribute.changedInPlace(storedText(path, oldStored), logical(value)),
    queryValues: value => attribute.ciphertextsForQuery(logical(value))
  };
}

const asNumber = (value: unknown): number | undefined =>
  typeof value === 'number' ? value : undefined;
const asBoolean = (value: unknown): boolean | undefined =>
  typeof value === 'boolean' ? value : undefined;
// Objects without a dedicated type are stored through String()
const asString = (value: unknown): string => String(value);

function codecFor(
  path: string,
  encryption: FieldEncryption,
  declaration: EncryptedFieldDeclaration
): FieldCodec {
  const { type = 'string', ...schemeOptions } = declaration;

  switch (type) {
    case 'integer':
      return createCodec(path, encryption.attribute(schemeOptions, IntegerSubtype), asNumber);
    case 'float':
      return createCodec(path, encryption.attribute(schemeOptions, FloatSubtype), asNumber);
    case 'boolean':
      return createCodec(path, encryption.attribute(schemeOptions, BooleanSubtype), asBoolean);
    case 'string':
      return createCodec(path, encryption.attribute(schemeOptions, StringSubtype), asString);
  }
}

export function encryptedFieldsPlugin(schema: Schema, options: EncryptedFieldsPluginOptions): void {
  const codecs = codecsBySchema.get(schema) ?? new Map<string, FieldCodec>();

  for (const [path, declaration] of Object.entries(options.fields)) {
    if (schema.pathType(path) !== 'real') {
      throw new ConfigurationError(`Cannot encrypt unknown path "${path}"`);
    }

    const schemaType = schema.path(path);
    if (schemaType.instance !== 'String') {
      throw new ConfigurationError(
        `Encrypted path "${path}" must be declared as String, got ${schemaType.instance}`
      );
    }

    const codec = codecFor(path, options.encryption, declaration);
    codecs.set(path, codec);

    schemaType.set(function (this: unknown, value: unknown, priorValue: unknown): unknown {
      if (this instanceof Query) {
        return value;
      }
      // Keep the stored ciphertext when the logical value is unchanged
      if (priorValue !== null && priorValue !== undefined && !codec.changedInPlace(priorValue, value)) {
        return priorValue;
      }
      return codec.serialize(value);
    });

    schemaType.get((stored: unknown): unknown => codec.deserialize(stored));
  }

  codecsBySchema.set(schema, codecs);
  logger.debug({ paths: [...codecs.keys()] }, 'Encrypted fields registered');
}

/**
 * Filter matching `value` on a deterministic encrypted path, across the
 * current and every previous deterministic scheme.
 */
export function encryptedQueryValues(
  schema: Schema,
  path: string,
  value: unknown
): { $in: string[] } {
  const codec = codecsBySchema.get(schema)?.get(path);
  if (!codec) {
    throw new ConfigurationError(`Path "${path}" is not an encrypted field`);
  }

  return { $in: codec.queryValues(value) };
}
