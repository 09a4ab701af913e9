import type Database from "better-sqlite3";
import { createDb, type DrizzleDb } from "../db/index.js";

export type ScopeStatus = "open" | "committed" | "rolled_back";

/** Thrown when a scope is used after commit or rollback. */
export class TransactionClosedError extends Error {
  readonly name = "TransactionClosedError" as const;
  constructor(status: ScopeStatus) {
    super(`Transaction already ${status === "committed" ? "committed" : "rolled back"}`);
  }
}

/**
 * One serializable transaction on one connection.
 *
 * Exactly one of commit/rollback takes effect; `onEnd` runs once afterwards
 * to hand back the connection and the write lease. A failed COMMIT rolls
 * back before rethrowing.
 */
export class TransactionScope {
  readonly db: DrizzleDb;
  private status: ScopeStatus = "open";

  private constructor(
    private readonly sqlite: Database.Database,
    private readonly onEnd: () => void,
  ) {
    this.db = createDb(sqlite);
  }

  /** BEGIN IMMEDIATE on `sqlite`. Calls `onEnd` and rethrows if the lock can't be taken. */
  static begin(sqlite: Database.Database, onEnd: () => void): TransactionScope {
    try {
      sqlite.exec("BEGIN IMMEDIATE");
    } catch (err) {
      onEnd();
      throw err;
    }
    return new TransactionScope(sqlite, onEnd);
  }

  get state(): ScopeStatus {
    return this.status;
  }

  get isOpen(): boolean {
    return this.status === "open";
  }

  assertOpen(): void {
    if (this.status !== "open") throw new TransactionClosedError(this.status);
  }

  commit(): void {
    this.assertOpen();
    try {
      this.sqlite.exec("COMMIT");
    } catch (err) {
      this.abort();
      throw err;
    }
    this.finish("committed");
  }

  /** Roll back. No-op once the scope has ended. */
  rollback(): void {
    if (this.status !== "open") return;
    this.abort();
  }

  /** Release the scope; anything not committed is rolled back. */
  dispose(): void {
    this.rollback();
  }

  private abort(): void {
    try {
      if (this.sqlite.open && this.sqlite.inTransaction) {
        this.sqlite.exec("ROLLBACK");
      }
    } finally {
      this.finish("rolled_back");
    }
  }

  private finish(status: ScopeStatus): void {
    this.status = status;
    this.onEnd();
  }
}
