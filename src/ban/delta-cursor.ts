import { logger } from "../config/logger.js";
import { toEpochMillis } from "./address-codec.js";
import { DrizzleIpAddressRepository } from "./drizzle-ip-address-repository.js";
import type { DeltaRow, ReconcileCounts } from "./ip-address-repository.js";
import type { TransactionScope } from "./transaction-scope.js";

/** One change the firewall has to apply. */
export interface FirewallDelta {
  address: string;
  /** true: block the address; false: unblock it */
  added: boolean;
}

export interface DeltaCommitOptions {
  now: Date;
  /** Zero the failed login count of every row whose delta is confirmed */
  resetFailedLoginCount: boolean;
}

export interface ReconcileSummary extends ReconcileCounts {
  added: number;
  removed: number;
}

export type DeltaCursorStatus = "reading" | "exhausted" | "committed" | "rolled_back";

/** Thrown when a cursor is committed before the firewall has seen every delta. */
export class IncompleteDeltaError extends Error {
  readonly name = "IncompleteDeltaError" as const;
  constructor() {
    super("Delta cursor committed before enumeration finished; rolled back");
  }
}

/** Thrown when a finished cursor is read from or closed again. */
export class DeltaCursorClosedError extends Error {
  readonly name = "DeltaCursorClosedError" as const;
  constructor(status: DeltaCursorStatus) {
    super(`Delta cursor already ${status === "committed" ? "committed" : "rolled back"}`);
  }
}

/**
 * Pending firewall changes, read lazily inside one transaction.
 *
 * Reading never mutates. Once every delta has been applied externally the
 * caller confirms with commit(), which applies the terminal transitions;
 * anything else rolls back and leaves the same deltas for the next run.
 *
 * commit() always commits the scope, whoever opened it, and abort() (read
 * failure, abandoned enumeration) always rolls it back. rollback() declines:
 * it ends a scope the cursor owns and leaves a caller's scope open.
 */
export class DeltaCursor implements Iterable<FirewallDelta> {
  private status: DeltaCursorStatus = "reading";
  private buffer: DeltaRow[] = [];
  private lastKey: Buffer | null = null;
  private added = 0;
  private removed = 0;
  private readonly repo: DrizzleIpAddressRepository;

  constructor(
    private readonly scope: TransactionScope,
    private readonly ownsScope: boolean,
    private readonly batchSize: number,
  ) {
    this.repo = new DrizzleIpAddressRepository(scope.db);
  }

  get state(): DeltaCursorStatus {
    return this.status;
  }

  get isClosed(): boolean {
    return this.status === "committed" || this.status === "rolled_back";
  }

  /** Next delta in address order, or null when none are left. */
  next(): FirewallDelta | null {
    if (this.status === "exhausted") return null;
    if (this.isClosed) throw new DeltaCursorClosedError(this.status);

    if (this.buffer.length === 0) {
      try {
        this.scope.assertOpen();
        this.buffer = this.repo.pageDeltas(this.lastKey, this.batchSize);
      } catch (err) {
        this.abort(err);
        throw err;
      }
      if (this.buffer.length === 0) {
        this.status = "exhausted";
        return null;
      }
    }

    const row = this.buffer.shift();
    if (!row) return null;
    this.lastKey = row.ipAddress;

    const added = row.state === "add_pending";
    if (added) this.added++;
    else this.removed++;
    return { address: row.ipAddressText, added };
  }

  *[Symbol.iterator](): Iterator<FirewallDelta> {
    for (let delta = this.next(); delta !== null; delta = this.next()) {
      yield delta;
    }
  }

  /** Confirm every delta was applied and advance the state machine. */
  commit(options: DeltaCommitOptions): ReconcileSummary {
    if (this.isClosed) throw new DeltaCursorClosedError(this.status);
    if (this.status !== "exhausted") {
      this.abort(new IncompleteDeltaError());
      throw new IncompleteDeltaError();
    }

    let counts: ReconcileCounts;
    try {
      this.scope.assertOpen();
      counts = this.repo.commitDeltas(options.resetFailedLoginCount, toEpochMillis(options.now));
      this.scope.commit();
    } catch (err) {
      this.abort(err);
      throw err;
    }

    this.status = "committed";
    const summary: ReconcileSummary = { added: this.added, removed: this.removed, ...counts };
    logger.info(summary, "Firewall deltas committed");
    return summary;
  }

  /** Decline the deltas. The rows stay pending for the next reconciliation. */
  rollback(): void {
    if (this.isClosed) return;
    this.status = "rolled_back";
    if (this.ownsScope) this.scope.rollback();
    logger.debug({ added: this.added, removed: this.removed }, "Firewall deltas declined");
  }

  /** Roll back whoever owns the scope. Used on failure and abandoned enumeration. */
  abort(reason?: unknown): void {
    if (this.isClosed) return;
    this.status = "rolled_back";
    this.scope.rollback();
    if (reason !== undefined) {
      logger.warn({ err: reason }, "Firewall delta reconciliation rolled back");
    }
  }
}
