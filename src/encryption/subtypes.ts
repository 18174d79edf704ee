/**
 * Logical types of encrypted attributes. A subtype turns a value into the
 * clear text that gets encrypted and casts decrypted text back.
 */

import { z } from 'zod';

import { DecryptionError, EncryptionError } from './errors.js';

export interface AttributeSubtype<T> {
  readonly name: string;
  /** Value -> clear text; null for absent values */
  serialize(value: T | null | undefined): string | null;
  /** Clear text -> value */
  cast(raw: string): T;
  equals(a: T | null, b: T | null): boolean;
}

const strictEquals = <T>(a: T | null, b: T | null): boolean => a === b;

export const StringSubtype: AttributeSubtype<string> = {
  name: 'string',
  serialize: value => (value === null || value === undefined ? null : String(value)),
  cast: raw => raw,
  equals: strictEquals
};

export const IntegerSubtype: AttributeSubtype<number> = {
  name: 'integer',
  serialize: value => {
    if (value === null || value === undefined) return null;
    if (!Number.isSafeInteger(value)) {
      throw new EncryptionError(`Expected a safe integer, got ${String(value)}`);
    }
    return value.toString(10);
  },
  cast: raw => {
    if (!/^-?\d+$/.test(raw)) {
      throw new DecryptionError('Decrypted value is not an integer');
    }
    return Number.parseInt(raw, 10);
  },
  equals: strictEquals
};

export const FloatSubtype: AttributeSubtype<number> = {
  name: 'float',
  serialize: value => {
    if (value === null || value === undefined) return null;
    if (!Number.isFinite(value)) {
      throw new EncryptionError(`Expected a finite number, got ${String(value)}`);
    }
    return String(value);
  },
  cast: raw => {
    const value = Number(raw);
    if (raw.trim().length === 0 || !Number.isFinite(value)) {
      throw new DecryptionError('Decrypted value is not a number');
    }
    return value;
  },
  equals: strictEquals
};

export const BooleanSubtype: AttributeSubtype<boolean> = {
  name: 'boolean',
  serialize: value => (value === null || value === undefined ? null : value ? 't' : 'f'),
  cast: raw => {
    if (raw === 't' || raw === 'true') return true;
    if (raw === 'f' || raw === 'false') return false;
    throw new DecryptionError('Decrypted value is not a boolean');
  },
  equals: strictEquals
};

export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(jsonValueSchema)
  ])
);

export const JsonSubtype: AttributeSubtype<JsonValue> = {
  name: 'json',
  serialize: value => (value === null || value === undefined ? null : JSON.stringify(value)),
  cast: raw => {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (error) {
      throw new DecryptionError('Decrypted value is not valid JSON', { cause: error });
    }

    const result = jsonValueSchema.safeParse(parsed);
    if (!result.success) {
      throw new DecryptionError('Decrypted value is not valid JSON', { cause: result.error });
    }
    return result.data;
  },
  equals: (a, b) => JSON.stringify(a) === JSON.stringify(b)
};
