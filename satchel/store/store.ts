import { ERR, SatchelError, StoreError, errorMessage } from "../core/errors.js";
import type { SessionState } from "../session/state.js";
import { SessionKey } from "./key.js";

/**
 * Persistence contract for session state.
 *
 * The whole state is the unit of persistence: `save` replaces, never merges.
 * There is no compare-and-swap, so when two callers load, mutate and save the
 * same key, the later `save` wins.
 */
export type SessionStore = {
  generateKey: () => Promise<SessionKey>;
  load: (key: SessionKey) => Promise<SessionState | null>;
  save: (key: SessionKey, state: SessionState) => Promise<void>;
  remove: (key: SessionKey) => Promise<void>;
};

export const DEFAULT_NAMESPACE = "session";
export const MAX_KEY_ATTEMPTS = 8;
export const NAMESPACE_PATTERN = /^[^:]+$/;

/** Falls back to `DEFAULT_NAMESPACE`; a namespace containing `:` would overlap another's keys. */
export function resolveNamespace(namespace: string | undefined): string {
  if (namespace === undefined) return DEFAULT_NAMESPACE;
  if (!NAMESPACE_PATTERN.test(namespace)) {
    throw new SatchelError(
      ERR.CONFIG_INVALID,
      `invalid namespace ${JSON.stringify(namespace)}: must be non-empty and must not contain ':'`,
      { namespace },
    );
  }
  return namespace;
}

/** The only place a backend key is built; stores call this once per operation. */
export function namespacedKey(namespace: string, key: SessionKey): string {
  return `${namespace}:${key.value}`;
}

/** Short prefix of a key for log lines; full keys are bearer credentials. */
export function keyHint(key: SessionKey): string {
  return `${key.value.slice(0, 6)}…`;
}

export async function generateUnusedKey(exists: (key: SessionKey) => Promise<boolean>): Promise<SessionKey> {
  for (let attempt = 0; attempt < MAX_KEY_ATTEMPTS; attempt++) {
    const key = SessionKey.generate();
    if (!(await exists(key))) return key;
  }
  throw new StoreError(
    ERR.STORE_KEY_EXHAUSTED,
    `no unused session key after ${MAX_KEY_ATTEMPTS} attempts`,
    null,
  );
}

export async function backendCall<T>(op: string, key: string | null, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (e) {
    if (e instanceof StoreError) throw e;
    throw new StoreError(ERR.STORE_BACKEND, `${op} failed: ${errorMessage(e)}`, key, e);
  }
}
