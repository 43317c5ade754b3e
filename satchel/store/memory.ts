import { ERR, StoreError } from "../core/errors.js";
import { getLogger, type Logger } from "../core/logger.js";
import { nowMs } from "../core/time.js";
import { decodeSessionState, encodeSessionState, type SessionState } from "../session/state.js";
import type { SessionKey } from "./key.js";
import { generateUnusedKey, keyHint, namespacedKey, resolveNamespace, type SessionStore } from "./store.js";

export type MemoryEntry = { blob: string; expiresAt: number | null };

/** Shared between store handles so they see each other's writes. */
export type MemoryBackend = Map<string, MemoryEntry>;

export type MemorySessionStoreOptions = {
  backend?: MemoryBackend;
  namespace?: string;
  ttlMs?: number | null;
  logger?: Logger;
};

export type MemorySessionStore = SessionStore & {
  backend: MemoryBackend;
};

export function createMemoryBackend(): MemoryBackend {
  return new Map();
}

export function createMemorySessionStore(opts: MemorySessionStoreOptions = {}): MemorySessionStore {
  const backend = opts.backend ?? createMemoryBackend();
  const namespace = resolveNamespace(opts.namespace);
  const ttlMs = opts.ttlMs ?? null;
  const log = opts.logger ?? getLogger("memory-store");

  function liveEntry(id: string, hint: string): MemoryEntry | null {
    const entry = backend.get(id);
    if (!entry) return null;
    if (entry.expiresAt !== null && entry.expiresAt <= nowMs()) {
      backend.delete(id);
      log.debug({ namespace, key: hint }, "dropped expired session");
      return null;
    }
    return entry;
  }

  return {
    backend,

    async generateKey() {
      return generateUnusedKey(async (key) => liveEntry(namespacedKey(namespace, key), keyHint(key)) !== null);
    },

    async load(key: SessionKey) {
      const id = namespacedKey(namespace, key);
      const entry = liveEntry(id, keyHint(key));
      if (!entry) return null;
      try {
        return decodeSessionState(entry.blob);
      } catch (e) {
        log.warn({ namespace, key: keyHint(key), err: e }, "corrupt session entry");
        throw new StoreError(ERR.STORE_CORRUPT_ENTRY, `corrupt session entry: ${keyHint(key)}`, id, e);
      }
    },

    async save(key: SessionKey, state: SessionState) {
      const id = namespacedKey(namespace, key);
      backend.set(id, {
        blob: encodeSessionState(state),
        expiresAt: ttlMs === null ? null : nowMs() + ttlMs,
      });
      log.debug({ namespace, key: keyHint(key), entries: state.size }, "saved session");
    },

    async remove(key: SessionKey) {
      const id = namespacedKey(namespace, key);
      backend.delete(id);
      log.debug({ namespace, key: keyHint(key) }, "removed session");
    },
  };
}
