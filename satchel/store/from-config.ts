import type { SatchelConfig } from "../core/config.js";
import { createLogger, setLogger } from "../core/logger.js";
import { openSessionDb } from "../db/libsql.js";
import { createLibsqlSessionStore } from "./libsql.js";
import { createMemorySessionStore } from "./memory.js";
import type { SessionStore } from "./store.js";

/** Builds the configured backend, installs the configured root logger, and migrates libSQL. */
export async function createSessionStoreFromConfig(config: SatchelConfig): Promise<SessionStore> {
  setLogger(createLogger({ level: config.logLevel, pretty: config.logPretty }));

  if (config.store === "memory") {
    return createMemorySessionStore({ namespace: config.namespace, ttlMs: config.ttlMs });
  }

  const { db } = openSessionDb(config.libsql);
  const store = createLibsqlSessionStore({ db, namespace: config.namespace, ttlMs: config.ttlMs });
  await store.migrate();
  return store;
}
