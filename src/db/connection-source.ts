import type Database from "better-sqlite3";
import { MEMORY_STORE_PATH } from "../config/index.js";
import { openConnection } from "./index.js";

export interface ConnectionLease {
  sqlite: Database.Database;
  /** Give the connection back. Closes it unless it is the shared connection. */
  release(): void;
}

/**
 * Hands out SQLite connections for one store file.
 *
 * `shared` serves reads and single-statement writes. Explicit transactions
 * check out their own connection so uncommitted work stays invisible to
 * `shared` readers. An in-memory database only exists on the connection that
 * created it, so there every checkout returns `shared`.
 */
export class ConnectionSource {
  readonly shared: Database.Database;
  readonly inMemory: boolean;
  private readonly leased = new Set<Database.Database>();

  constructor(
    readonly path: string,
    private readonly busyTimeoutMs: number,
  ) {
    this.inMemory = path === MEMORY_STORE_PATH;
    this.shared = openConnection(path, busyTimeoutMs);
  }

  checkout(): ConnectionLease {
    if (this.inMemory) {
      return { sqlite: this.shared, release: () => {} };
    }

    const sqlite = openConnection(this.path, this.busyTimeoutMs);
    this.leased.add(sqlite);
    return {
      sqlite,
      release: () => {
        if (!this.leased.delete(sqlite)) return;
        sqlite.close();
      },
    };
  }

  close(): void {
    for (const sqlite of this.leased) {
      sqlite.close();
    }
    this.leased.clear();
    this.shared.close();
  }
}
