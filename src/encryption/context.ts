/**
 * Scoped encryption context.
 *
 * Overrides live in an AsyncLocalStorage, so they are visible only to code
 * running inside the scope (including its async continuations) and never to
 * concurrent tasks. Nested scopes merge; the innermost value wins.
 */

import { AsyncLocalStorage } from 'node:async_hooks';

import { NullEncryptor, ProtectedEncryptor, type Encryptor } from './encryptor.js';
import type { KeyProvider } from './key-providers.js';

export interface EncryptionContextOverrides {
  encryptor?: Encryptor;
  keyProvider?: KeyProvider;
}

export type EncryptionContext = Readonly<EncryptionContextOverrides>;

const EMPTY_CONTEXT: EncryptionContext = Object.freeze({});

const storage = new AsyncLocalStorage<EncryptionContext>();

export function currentEncryptionContext(): EncryptionContext {
  return storage.getStore() ?? EMPTY_CONTEXT;
}

/**
 * Run `body` with `overrides` applied. The override is removed when `body`
 * returns or throws; for async bodies it stays visible to their continuations.
 */
export function withEncryptionContext<T>(overrides: EncryptionContextOverrides, body: () => T): T {
  const merged: EncryptionContextOverrides = { ...currentEncryptionContext() };

  if (overrides.encryptor) merged.encryptor = overrides.encryptor;
  if (overrides.keyProvider) merged.keyProvider = overrides.keyProvider;

  return storage.run(Object.freeze(merged), body);
}

const nullEncryptor = new NullEncryptor();

/**
 * Reads return stored text as-is and writes store clear text.
 */
export function withoutEncryption<T>(body: () => T): T {
  return withEncryptionContext({ encryptor: nullEncryptor }, body);
}

/**
 * Reads still decrypt; any write through an encrypted attribute raises
 * {@link ProtectedEncryptedDataError}.
 */
export function protectingEncryptedData<T>(body: () => T): T {
  return withEncryptionContext({ encryptor: new ProtectedEncryptor() }, body);
}
