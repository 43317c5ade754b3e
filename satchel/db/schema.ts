import { index, integer, sqliteTable, text } from "drizzle-orm/sqlite-core";

export const satchelSessions = sqliteTable(
  "satchel_sessions",
  {
    // "<namespace>:<session key>"
    session_key: text("session_key").primaryKey(),
    state: text("state").notNull(),
    expires_ts: integer("expires_ts"),
    updated_ts: integer("updated_ts").notNull(),
  },
  (t) => ({
    idx_sessions_expires: index("idx_satchel_sessions_expires").on(t.expires_ts),
  }),
);

// Must stay in step with the table above.
export const SATCHEL_SCHEMA_SQL = [
  `CREATE TABLE IF NOT EXISTS satchel_sessions (
  session_key TEXT PRIMARY KEY,
  state TEXT NOT NULL,
  expires_ts INTEGER,
  updated_ts INTEGER NOT NULL
)`,
  `CREATE INDEX IF NOT EXISTS idx_satchel_sessions_expires ON satchel_sessions(expires_ts)`,
] as const;
