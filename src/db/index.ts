import Database from "better-sqlite3";
import { drizzle } from "drizzle-orm/better-sqlite3";
import type { BetterSQLite3Database } from "drizzle-orm/better-sqlite3";
import type { BaseSQLiteDatabase } from "drizzle-orm/sqlite-core";
import { applyStorePragmas } from "./pragmas.js";
import * as schema from "./schema/index.js";

/** The schema type shared across all db instances. */
export type Schema = typeof schema;

/** Drizzle handle over one better-sqlite3 connection. */
export type DrizzleDb = BetterSQLite3Database<Schema>;

/**
 * Structural handle satisfied by both a connection-level DrizzleDb and the
 * `tx` drizzle passes into `db.transaction()`. Repository code accepts this.
 */
export type SqliteExecutor = BaseSQLiteDatabase<"sync", Database.RunResult, Schema>;

/** Create a Drizzle database instance wrapping the given connection. */
export function createDb(sqlite: Database.Database): DrizzleDb {
  return drizzle(sqlite, { schema });
}

/** Open a connection to `path` with the store pragmas applied. */
export function openConnection(path: string, busyTimeoutMs?: number): Database.Database {
  const sqlite = new Database(path);
  applyStorePragmas(sqlite, busyTimeoutMs);
  return sqlite;
}

export { schema };
