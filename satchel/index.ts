export { Session } from "./session/session.js";
export type { SessionStatus } from "./session/status.js";
export { SessionState, encodeSessionState, decodeSessionState } from "./session/state.js";
export { createSessions } from "./session/lifecycle.js";
export type { Sessions, SessionsOptions, OpenedSession, CommitOutcome, RunResult } from "./session/lifecycle.js";

export { StateStorage, encodeValue, decodeValue } from "./storage/storage.js";
export type { Storage, ValueSchema } from "./storage/storage.js";

export { SessionKey } from "./store/key.js";
export type { SessionStore } from "./store/store.js";
export { DEFAULT_NAMESPACE, namespacedKey, resolveNamespace } from "./store/store.js";
export { createMemorySessionStore, createMemoryBackend } from "./store/memory.js";
export type { MemorySessionStore, MemorySessionStoreOptions, MemoryBackend, MemoryEntry } from "./store/memory.js";
export { createLibsqlSessionStore } from "./store/libsql.js";
export type { LibsqlSessionStore, LibsqlSessionStoreOptions } from "./store/libsql.js";
export { createSessionStoreFromConfig } from "./store/from-config.js";

export {
  SatchelError,
  ERR,
  StorageError,
  SerializeError,
  DeserializeError,
  SessionDestroyedError,
  StoreError,
} from "./core/errors.js";
export type { StorageOp } from "./core/errors.js";

export { loadConfig } from "./core/config.js";
export type { SatchelConfig } from "./core/config.js";
export { createLogger, getLogger, setLogger } from "./core/logger.js";
export type { Logger, LoggerOptions, LogLevel } from "./core/logger.js";

export { openSessionDb, type SessionDb, type SessionDbOptions } from "./db/libsql.js";
export type { SqlClient } from "./db/db.js";
