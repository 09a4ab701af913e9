import Database from "better-sqlite3";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { runMigrations } from "./migrate.js";

vi.mock("../config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

function columnNames(sqlite: Database.Database): string[] {
  return sqlite
    .prepare<[], { name: string }>("PRAGMA table_info(ip_addresses)")
    .all()
    .map((c) => c.name);
}

function indexNames(sqlite: Database.Database): string[] {
  return sqlite
    .prepare<[], { name: string }>(
      "SELECT name FROM sqlite_master WHERE type = 'index' AND tbl_name = 'ip_addresses' AND name LIKE 'idx_%' ORDER BY name",
    )
    .all()
    .map((r) => r.name);
}

/** The file layout shipped before state tracking and ban end dates. */
function createLegacyTable(sqlite: Database.Database): void {
  sqlite.exec(`
    CREATE TABLE ip_addresses (
      ip_address BLOB NOT NULL,
      ip_address_text TEXT NOT NULL,
      last_failed_login INTEGER NOT NULL,
      failed_login_count INTEGER NOT NULL,
      ban_date INTEGER NULL,
      PRIMARY KEY (ip_address)
    )
  `);
}

describe("runMigrations", () => {
  let sqlite: Database.Database;

  beforeEach(() => {
    sqlite = new Database(":memory:");
  });

  afterEach(() => {
    sqlite.close();
  });

  it("creates the full table on a fresh database", () => {
    const report = runMigrations(sqlite);
    expect(columnNames(sqlite)).toEqual([
      "ip_address",
      "ip_address_text",
      "last_failed_login",
      "failed_login_count",
      "ban_date",
      "state",
      "ban_end_date",
    ]);
    expect(report.addedColumns).toEqual(["state", "ban_end_date"]);
    expect(report.healedRows).toBe(0);
  });

  it("creates indexes on the filtered columns", () => {
    runMigrations(sqlite);
    expect(indexNames(sqlite)).toEqual([
      "idx_ip_addresses_ban_date",
      "idx_ip_addresses_ban_end_date",
      "idx_ip_addresses_last_failed_login",
      "idx_ip_addresses_state",
    ]);
  });

  it("adds nothing on a second run", () => {
    runMigrations(sqlite);
    const second = runMigrations(sqlite);
    expect(second).toEqual({ addedColumns: [], healedRows: 0 });
  });

  it("upgrades a legacy file and heals rows without a ban window", () => {
    createLegacyTable(sqlite);
    const insert = sqlite.prepare(
      "INSERT INTO ip_addresses (ip_address, ip_address_text, last_failed_login, failed_login_count, ban_date) VALUES (?, ?, ?, ?, ?)",
    );
    insert.run(Buffer.from([10, 0, 0, 1]), "10.0.0.1", 1000, 3, null);
    insert.run(Buffer.from([10, 0, 0, 2]), "10.0.0.2", 2000, 0, 5000);

    const report = runMigrations(sqlite);

    expect(report.addedColumns).toEqual(["state", "ban_end_date"]);
    expect(report.healedRows).toBe(1);

    const rows = sqlite
      .prepare<[], { ip_address_text: string; state: number; ban_end_date: number | null }>(
        "SELECT ip_address_text, state, ban_end_date FROM ip_addresses ORDER BY ip_address",
      )
      .all();
    expect(rows).toEqual([
      { ip_address_text: "10.0.0.1", state: 3, ban_end_date: null },
      { ip_address_text: "10.0.0.2", state: 0, ban_end_date: null },
    ]);
  });

  it("heals add-pending rows that lost their ban window", () => {
    runMigrations(sqlite);
    sqlite
      .prepare(
        "INSERT INTO ip_addresses (ip_address, ip_address_text, last_failed_login, failed_login_count, ban_date, state, ban_end_date) VALUES (?, ?, 0, 0, NULL, 1, NULL)",
      )
      .run(Buffer.from([192, 168, 1, 1]), "192.168.1.1");

    expect(runMigrations(sqlite).healedRows).toBe(1);
    const state = sqlite.prepare("SELECT state FROM ip_addresses").pluck().get();
    expect(state).toBe(3);
  });
});
