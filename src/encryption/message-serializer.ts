/**
 * Message <-> stored text.
 *
 * Format (JSON, safe for a text column):
 *
 *   {"p":"<base64 payload>","h":{"iv":"<b64>","at":"<b64>","e":"<b64>","i":"<b64>","k":{...}}}
 *
 * - p: ciphertext
 * - h.iv: initialization vector
 * - h.at: authentication tag
 * - h.e: clear text encoding
 * - h.i: id of the key used (when key references are stored)
 * - h.k: wrapped data key, itself a message (envelope mode)
 *
 * Every header value is canonical, padded base64. Only one level of nesting
 * is accepted.
 */

import { z } from 'zod';

import { DecryptionError, EncryptionError } from './errors.js';
import { Message, type MessageHeaders } from './message.js';

const base64 = z.string().regex(/^[A-Za-z0-9+/]*={0,2}$/, 'must be base64 encoded');

const leafHeadersSchema = z
  .object({
    iv: base64.optional(),
    at: base64.optional(),
    e: base64.optional(),
    i: base64.optional()
  })
  .strict();

const leafMessageSchema = z
  .object({
    p: base64,
    h: leafHeadersSchema
  })
  .strict();

const messageSchema = z
  .object({
    p: base64,
    h: leafHeadersSchema.extend({ k: leafMessageSchema.optional() }).strict()
  })
  .strict();

type SerializedLeafMessage = z.infer<typeof leafMessageSchema>;
type SerializedHeaders = z.infer<typeof messageSchema>['h'];

const encode = (value: Buffer): string => value.toString('base64');

// Buffer.from drops stray padding bits and short groups, so any other spelling
// of the same bytes is refused
function decode(value: string): Buffer {
  const bytes = Buffer.from(value, 'base64');
  if (value.length % 4 !== 0 || encode(bytes) !== value) {
    throw new DecryptionError('Encrypted content is not valid base64');
  }
  return bytes;
}

function headersFromJson(headers: SerializedHeaders): MessageHeaders {
  const result: MessageHeaders = {};

  if (headers.iv !== undefined) result.iv = decode(headers.iv);
  if (headers.at !== undefined) result.authTag = decode(headers.at);
  if (headers.e !== undefined) result.encoding = decode(headers.e).toString('utf-8');
  if (headers.i !== undefined) result.encryptedDataKeyId = decode(headers.i).toString('utf-8');
  if (headers.k !== undefined) {
    result.encryptedDataKey = new Message(decode(headers.k.p), headersFromJson(headers.k.h));
  }

  return result;
}

function leafToJson(message: Message): SerializedLeafMessage {
  const { iv, authTag, encoding, encryptedDataKeyId } = message.headers;
  const h: SerializedLeafMessage['h'] = {};

  if (iv) h.iv = encode(iv);
  if (authTag) h.at = encode(authTag);
  if (encoding !== undefined) h.e = encode(Buffer.from(encoding, 'utf-8'));
  if (encryptedDataKeyId !== undefined) h.i = encode(Buffer.from(encryptedDataKeyId, 'utf-8'));

  return { p: encode(message.payload), h };
}

/**
 * Serialize a message to its stored text form.
 */
export function serializeMessage(message: Message): string {
  const { p, h: leafHeaders } = leafToJson(message);
  const h: SerializedHeaders = { ...leafHeaders };
  const { encryptedDataKey } = message.headers;

  if (encryptedDataKey) {
    if (encryptedDataKey.headers.encryptedDataKey) {
      throw new EncryptionError('Wrapped data keys cannot themselves carry a wrapped key');
    }
    h.k = leafToJson(encryptedDataKey);
  }

  return JSON.stringify({ p, h });
}

/**
 * Parse stored text into a message. Anything that is not a well formed
 * message raises a {@link DecryptionError}.
 */
export function deserializeMessage(text: string): Message {
  let parsed: unknown;

  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new DecryptionError('Encrypted content is not valid JSON', { cause: error });
  }

  const result = messageSchema.safeParse(parsed);
  if (!result.success) {
    throw new DecryptionError('Encrypted content is not a valid message', {
      cause: result.error
    });
  }

  return new Message(decode(result.data.p), headersFromJson(result.data.h));
}

/**
 * Whether `text` parses as a stored message.
 */
export function isSerializedMessage(text: string): boolean {
  try {
    deserializeMessage(text);
    return true;
  } catch (error) {
    if (error instanceof DecryptionError) {
      return false;
    }
    throw error;
  }
}
