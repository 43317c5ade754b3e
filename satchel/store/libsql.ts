import { and, eq, gte, isNotNull, lt, lte } from "drizzle-orm";
import { ERR, StoreError } from "../core/errors.js";
import { getLogger, type Logger } from "../core/logger.js";
import { nowMs } from "../core/time.js";
import { applySchema, type SqlClient } from "../db/db.js";
import { satchelSessions } from "../db/schema.js";
import { decodeSessionState, encodeSessionState, type SessionState } from "../session/state.js";
import type { SessionKey } from "./key.js";
import {
  backendCall,
  generateUnusedKey,
  keyHint,
  namespacedKey,
  resolveNamespace,
  type SessionStore,
} from "./store.js";

export type LibsqlSessionStoreOptions = {
  db: SqlClient;
  namespace?: string;
  /** `null` or omitted: entries never expire. */
  ttlMs?: number | null;
  logger?: Logger;
};

export type LibsqlSessionStore = SessionStore & {
  migrate: () => Promise<void>;
  /** Deletes expired rows in this namespace and returns how many went. */
  purgeExpired: () => Promise<number>;
};

export function createLibsqlSessionStore(opts: LibsqlSessionStoreOptions): LibsqlSessionStore {
  const { db } = opts;
  const namespace = resolveNamespace(opts.namespace);
  const ttlMs = opts.ttlMs ?? null;
  const log = opts.logger ?? getLogger("libsql-store");

  async function readRow(id: string): Promise<{ state: string } | null> {
    const rows = await db
      .select({ state: satchelSessions.state, expires_ts: satchelSessions.expires_ts })
      .from(satchelSessions)
      .where(eq(satchelSessions.session_key, id))
      .limit(1);
    const row = rows[0];
    if (!row) return null;

    const now = nowMs();
    if (row.expires_ts !== null && row.expires_ts <= now) {
      // a save may have refreshed the row since the select; only drop it if still expired
      await db
        .delete(satchelSessions)
        .where(
          and(
            eq(satchelSessions.session_key, id),
            isNotNull(satchelSessions.expires_ts),
            lte(satchelSessions.expires_ts, now),
          ),
        );
      return null;
    }
    return { state: row.state };
  }

  return {
    async migrate() {
      await backendCall("migrate", null, () => applySchema(db));
    },

    async generateKey() {
      return generateUnusedKey((key) =>
        backendCall("generateKey", null, async () => (await readRow(namespacedKey(namespace, key))) !== null),
      );
    },

    async load(key: SessionKey) {
      const id = namespacedKey(namespace, key);
      const row = await backendCall("load", id, () => readRow(id));
      if (!row) {
        log.debug({ namespace, key: keyHint(key) }, "no stored session");
        return null;
      }

      try {
        return decodeSessionState(row.state);
      } catch (e) {
        log.warn({ namespace, key: keyHint(key), err: e }, "corrupt session entry");
        throw new StoreError(ERR.STORE_CORRUPT_ENTRY, `corrupt session entry: ${keyHint(key)}`, id, e);
      }
    },

    async save(key: SessionKey, state: SessionState) {
      const id = namespacedKey(namespace, key);
      const now = nowMs();
      const blob = encodeSessionState(state);
      const expires = ttlMs === null ? null : now + ttlMs;

      await backendCall("save", id, async () => {
        await db
          .insert(satchelSessions)
          .values({ session_key: id, state: blob, expires_ts: expires, updated_ts: now })
          .onConflictDoUpdate({
            target: satchelSessions.session_key,
            set: { state: blob, expires_ts: expires, updated_ts: now },
          });
      });
      log.debug({ namespace, key: keyHint(key), entries: state.size }, "saved session");
    },

    async remove(key: SessionKey) {
      const id = namespacedKey(namespace, key);
      await backendCall("remove", id, async () => {
        await db.delete(satchelSessions).where(eq(satchelSessions.session_key, id));
      });
      log.debug({ namespace, key: keyHint(key) }, "removed session");
    },

    async purgeExpired() {
      const deleted = await backendCall("purgeExpired", null, async () =>
        db
          .delete(satchelSessions)
          .where(
            and(
              isNotNull(satchelSessions.expires_ts),
              lte(satchelSessions.expires_ts, nowMs()),
              // keys in this namespace sort between "<ns>:" and "<ns>;"
              gte(satchelSessions.session_key, `${namespace}:`),
              lt(satchelSessions.session_key, `${namespace};`),
            ),
          )
          .returning({ key: satchelSessions.session_key }),
      );
      if (deleted.length > 0) log.debug({ namespace, count: deleted.length }, "purged expired sessions");
      return deleted.length;
    },
  };
}
