import { createClient } from "@libsql/client";
import { drizzle } from "drizzle-orm/libsql";
import type { SqlClient } from "./db.js";

export type SessionDbOptions = {
  /** `:memory:`, a `file:` path, or a remote server (`libsql://`, `https://`, `wss://`). */
  url: string;
  authToken?: string;
};

/** A drizzle handle over one libSQL connection; `close` ends the connection. */
export type SessionDb = {
  db: SqlClient;
  close(): void;
};

export function openSessionDb(opts: SessionDbOptions): SessionDb {
  const client = createClient({ url: opts.url, authToken: opts.authToken });
  return { db: drizzle(client), close: () => client.close() };
}
