import type Database from "better-sqlite3";

export const DEFAULT_BUSY_TIMEOUT_MS = 5000;

/**
 * Apply standard store pragmas to a SQLite connection.
 *
 * - auto_vacuum = INCREMENTAL: lets deleted bans give pages back without a full VACUUM
 * - journal_mode = WAL: readers don't block the writer and vice versa
 * - busy_timeout: wait this long for another process's write lock instead of
 *   failing immediately with SQLITE_BUSY
 *
 * In-memory databases ignore WAL and report journal_mode "memory".
 */
export function applyStorePragmas(sqlite: Database.Database, busyTimeoutMs = DEFAULT_BUSY_TIMEOUT_MS): void {
  sqlite.pragma("auto_vacuum = INCREMENTAL");
  sqlite.pragma("journal_mode = WAL");
  sqlite.pragma(`busy_timeout = ${Math.max(0, Math.trunc(busyTimeoutMs))}`);
}
