import type { LibSQLDatabase } from "drizzle-orm/libsql";
import { sql } from "drizzle-orm";
import { SATCHEL_SCHEMA_SQL } from "./schema.js";

export type SqlClient = LibSQLDatabase;

export async function applySchema(db: SqlClient): Promise<void> {
  for (const statement of SATCHEL_SCHEMA_SQL) {
    await db.run(sql.raw(statement));
  }
}
