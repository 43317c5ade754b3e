export class SatchelError extends Error {
  code: string;
  details?: unknown;
  constructor(code: string, message: string, details?: unknown, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "SatchelError";
    this.code = code;
    this.details = details;
  }
}

export const ERR = {
  SERIALIZE: "SATCHEL_SERIALIZE",
  DESERIALIZE: "SATCHEL_DESERIALIZE",
  SESSION_DESTROYED: "SATCHEL_SESSION_DESTROYED",
  STATE_CORRUPT: "SATCHEL_STATE_CORRUPT",
  INVALID_SESSION_KEY: "SATCHEL_INVALID_SESSION_KEY",
  STORE_CORRUPT_ENTRY: "SATCHEL_STORE_CORRUPT_ENTRY",
  STORE_BACKEND: "SATCHEL_STORE_BACKEND",
  STORE_KEY_EXHAUSTED: "SATCHEL_STORE_KEY_EXHAUSTED",
  CONFIG_INVALID: "SATCHEL_CONFIG_INVALID",
} as const;

export type StorageOp = "insert" | "get" | "remove";

/** A typed value could not be moved in or out of its text encoding. */
export class StorageError extends SatchelError {
  readonly op: StorageOp;
  readonly key: string;
  constructor(code: string, op: StorageOp, key: string, cause: unknown) {
    super(code, `${op} "${key}": ${errorMessage(cause)}`, { op, key }, { cause });
    this.name = "StorageError";
    this.op = op;
    this.key = key;
  }
}

export class SerializeError extends StorageError {
  constructor(key: string, cause: unknown) {
    super(ERR.SERIALIZE, "insert", key, cause);
    this.name = "SerializeError";
  }
}

/**
 * The stored text under `key` did not decode as the requested type.
 * For `remove` the slot has already been cleared when this is thrown.
 */
export class DeserializeError extends StorageError {
  constructor(op: "get" | "remove", key: string, cause: unknown) {
    super(ERR.DESERIALIZE, op, key, cause);
    this.name = "DeserializeError";
  }
}

export class SessionDestroyedError extends SatchelError {
  constructor() {
    super(ERR.SESSION_DESTROYED, "Session is destroyed");
    this.name = "SessionDestroyedError";
  }
}

export class StoreError extends SatchelError {
  readonly key: string | null;
  constructor(code: string, message: string, key: string | null, cause?: unknown) {
    super(code, message, { key }, cause === undefined ? undefined : { cause });
    this.name = "StoreError";
    this.key = key;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
