import type Database from "better-sqlite3";
import { logger } from "../config/logger.js";

/**
 * MIGRATION CONVENTIONS
 *
 * The store file must stay loadable by every earlier release, so schema
 * changes are additive only:
 *   - CREATE TABLE / CREATE INDEX ... IF NOT EXISTS
 *   - ADD COLUMN, nullable or with a DEFAULT, skipped when already present
 *   - data heals as plain UPDATEs that are no-ops on a second run
 *
 * Never drop or rename a column here.
 */

/** Columns added after the first file format, in the order they shipped. */
const ADDED_COLUMNS: ReadonlyArray<{ name: string; ddl: string }> = [
  { name: "state", ddl: "ALTER TABLE ip_addresses ADD COLUMN state INTEGER NOT NULL DEFAULT 0" },
  { name: "ban_end_date", ddl: "ALTER TABLE ip_addresses ADD COLUMN ban_end_date INTEGER NULL" },
];

export interface MigrationReport {
  /** Columns that had to be added to an older file */
  addedColumns: string[];
  /** Rows moved to failed_login because they claimed a ban without a ban window */
  healedRows: number;
}

function existingColumns(sqlite: Database.Database): Set<string> {
  const rows = sqlite.prepare<[], { name: string }>("PRAGMA table_info(ip_addresses)").all();
  return new Set(rows.map((r) => r.name));
}

function isDuplicateColumnError(err: unknown): boolean {
  return err instanceof Error && /duplicate column name/i.test(err.message);
}

/**
 * Create or upgrade the ip_addresses table. Idempotent; safe on every open.
 */
export function runMigrations(sqlite: Database.Database): MigrationReport {
  sqlite.exec(`
    CREATE TABLE IF NOT EXISTS ip_addresses (
      ip_address BLOB NOT NULL,
      ip_address_text TEXT NOT NULL,
      last_failed_login INTEGER NOT NULL,
      failed_login_count INTEGER NOT NULL,
      ban_date INTEGER NULL,
      PRIMARY KEY (ip_address)
    )
  `);

  const addedColumns: string[] = [];
  const present = existingColumns(sqlite);
  for (const column of ADDED_COLUMNS) {
    if (present.has(column.name)) continue;
    try {
      sqlite.exec(column.ddl);
      addedColumns.push(column.name);
    } catch (err) {
      // Another process upgraded the file between our table_info read and the ALTER.
      if (!isDuplicateColumnError(err)) throw err;
      logger.debug({ column: column.name }, "Ban store column already present, skipping");
    }
  }

  sqlite.exec("CREATE INDEX IF NOT EXISTS idx_ip_addresses_last_failed_login ON ip_addresses (last_failed_login)");
  sqlite.exec("CREATE INDEX IF NOT EXISTS idx_ip_addresses_ban_date ON ip_addresses (ban_date)");
  sqlite.exec("CREATE INDEX IF NOT EXISTS idx_ip_addresses_ban_end_date ON ip_addresses (ban_end_date)");
  sqlite.exec("CREATE INDEX IF NOT EXISTS idx_ip_addresses_state ON ip_addresses (state)");

  // Files written before state tracking default every row to active (0).
  // Anything active or add-pending without a ban window is really a failed login (3).
  const healed = sqlite.prepare("UPDATE ip_addresses SET state = 3 WHERE state IN (0, 1) AND ban_date IS NULL").run();

  if (addedColumns.length > 0) {
    logger.info({ addedColumns }, "Ban store schema upgraded");
  }
  if (healed.changes > 0) {
    logger.info({ healedRows: healed.changes }, "Ban store healed rows without a ban window");
  }

  return { addedColumns, healedRows: healed.changes };
}
