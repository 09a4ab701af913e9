import { mkdirSync } from "node:fs";
import path from "node:path";
import { config, MEMORY_STORE_PATH, type StoreConfig } from "../config/index.js";
import { logger } from "../config/logger.js";
import { ConnectionSource } from "../db/connection-source.js";
import { createDb, type DrizzleDb } from "../db/index.js";
import { type MigrationReport, runMigrations } from "../db/migrate.js";
import {
  type AddressEntry,
  type AddressEntryInput,
  type AddressRange,
  decodeEntry,
  decodeState,
  encodeEntry,
  type ParsedAddress,
  parseAddress,
  parseRange,
  toEpochMillis,
} from "./address-codec.js";
import { type AddressState, isAddressState } from "./address-state.js";
import { DeltaCursor, type FirewallDelta, type ReconcileSummary } from "./delta-cursor.js";
import { DrizzleIpAddressRepository } from "./drizzle-ip-address-repository.js";
import type { EntryFilter } from "./ip-address-repository.js";
import { TransactionScope } from "./transaction-scope.js";
import { WriteGate } from "./write-gate.js";

export type BanStoreOptions = Partial<StoreConfig>;

export interface BanRequest {
  address: string;
  banStartDate: Date;
  banEndDate: Date;
}

export interface BanWindow {
  start: Date | null;
  end: Date | null;
}

export interface ReconcileOptions {
  /** Apply terminal transitions once the sequence is fully consumed */
  commit: boolean;
  now: Date;
  /** Defaults to store.resetFailedLoginCountOnUnban */
  resetFailedLoginCount?: boolean;
  scope?: TransactionScope;
}

/** Thrown when a store is used after close(). */
export class StoreClosedError extends Error {
  readonly name = "StoreClosedError" as const;
  constructor() {
    super("Ban store is closed");
  }
}

function parseAll(addresses: Iterable<string>): ParsedAddress[] {
  const parsed: ParsedAddress[] = [];
  for (const address of addresses) {
    const p = parseAddress(address);
    if (p) parsed.push(p);
    else logger.debug({ address }, "Ignoring malformed address");
  }
  return parsed;
}

/**
 * Persistent ban ledger: failed-login counters, ban windows and the pending
 * firewall deltas, in one SQLite file.
 *
 * Every method takes an optional TransactionScope from beginTransaction().
 * Without one, a write runs in its own IMMEDIATE transaction under the store's
 * write gate, and a read runs against the shared connection. A caller holding
 * a scope must pass it to every call it makes until the scope ends; a write
 * without it waits for the scope's lease.
 *
 * Malformed addresses never throw: they yield 0, false, null or nothing.
 */
export class BanStore {
  private readonly gate = new WriteGate();
  private readonly shared: DrizzleDb;
  private closed = false;

  private constructor(
    readonly settings: StoreConfig,
    private readonly connections: ConnectionSource,
    readonly migration: MigrationReport,
  ) {
    this.shared = createDb(connections.shared);
  }

  /** Open (creating if needed) and migrate the store at `options.path`. */
  static open(options: BanStoreOptions = {}): BanStore {
    const settings: StoreConfig = { ...config.store, ...options };
    const inMemory = settings.path === MEMORY_STORE_PATH;
    if (!inMemory) {
      mkdirSync(path.dirname(path.resolve(settings.path)), { recursive: true });
    }

    logger.info({ path: settings.path, inMemory }, "Opening ban store");
    const connections = new ConnectionSource(settings.path, settings.busyTimeoutMs);
    let migration: MigrationReport;
    try {
      migration = runMigrations(connections.shared);
    } catch (err) {
      connections.close();
      throw err;
    }
    return new BanStore(settings, connections, migration);
  }

  get isOpen(): boolean {
    return !this.closed;
  }

  get inMemory(): boolean {
    return this.connections.inMemory;
  }

  /** Close every connection. Scopes still open are rolled back by SQLite. */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.connections.close();
    logger.info({ path: this.settings.path }, "Ban store closed");
  }

  // ---------------------------------------------------------------------------
  // Transactions
  // ---------------------------------------------------------------------------

  /** Take the write lease and open a serializable transaction on a dedicated connection. */
  async beginTransaction(): Promise<TransactionScope> {
    this.assertOpen();
    const release = await this.gate.acquire();
    try {
      this.assertOpen();
      const lease = this.connections.checkout();
      return TransactionScope.begin(lease.sqlite, () => {
        lease.release();
        release();
      });
    } catch (err) {
      release();
      throw err;
    }
  }

  commit(scope: TransactionScope): void {
    scope.commit();
  }

  /** Roll back. No-op when the scope already ended. */
  rollback(scope: TransactionScope): void {
    scope.rollback();
  }

  /** Run `fn` in a fresh scope: commit when it resolves, roll back when it throws. */
  async withTransaction<T>(fn: (scope: TransactionScope) => Promise<T> | T): Promise<T> {
    const scope = await this.beginTransaction();
    try {
      const result = await fn(scope);
      if (scope.isOpen) scope.commit();
      return result;
    } finally {
      scope.rollback();
    }
  }

  // ---------------------------------------------------------------------------
  // Policy engine surface
  // ---------------------------------------------------------------------------

  /**
   * Count a failed login. Only rows in failed_login (or new rows) change;
   * banned rows keep their count. Returns the stored count afterwards, 0 for
   * a malformed address.
   */
  async incrementFailedLogin(address: string, when: Date, amount = 1, scope?: TransactionScope): Promise<number> {
    if (!Number.isInteger(amount) || amount < 0) {
      throw new RangeError(`Failed login increment must be a non-negative integer, got ${amount}`);
    }
    const parsed = this.parse(address);
    if (!parsed) return 0;
    const whenMs = toEpochMillis(when);
    return this.write(scope, (repo) => repo.incrementFailedLogin(parsed, whenMs, amount));
  }

  /**
   * Conditional ban upsert. Inserts new addresses as add_pending; reopens an
   * existing row only when it isn't remove_pending and its ban has lapsed.
   * Returns rows affected: 1 when the ban was applied, else 0.
   */
  async applyBan(
    address: string,
    banStartDate: Date,
    banEndDate: Date,
    now: Date,
    scope?: TransactionScope,
  ): Promise<number> {
    const parsed = this.parse(address);
    if (!parsed) return 0;
    const start = toEpochMillis(banStartDate);
    const end = toEpochMillis(banEndDate);
    const nowMs = toEpochMillis(now);
    return this.write(scope, (repo) => repo.upsertBan(parsed, start, end, nowMs));
  }

  /** applyBan for many addresses in one transaction. Returns how many bans were newly applied. */
  async applyBans(bans: Iterable<BanRequest>, now: Date, scope?: TransactionScope): Promise<number> {
    const nowMs = toEpochMillis(now);
    const requests: Array<{ parsed: ParsedAddress; start: number; end: number }> = [];
    for (const ban of bans) {
      const parsed = this.parse(ban.address);
      if (!parsed) continue;
      requests.push({ parsed, start: toEpochMillis(ban.banStartDate), end: toEpochMillis(ban.banEndDate) });
    }
    if (requests.length === 0) return 0;

    return this.write(scope, (repo) => {
      let applied = 0;
      for (const r of requests) {
        applied += repo.upsertBan(r.parsed, r.start, r.end, nowMs);
      }
      return applied;
    });
  }

  /**
   * Administrative override: force `state` on the given addresses, or on
   * every row when `addresses` is null. Returns rows changed.
   */
  async setState(addresses: Iterable<string> | null, state: AddressState, scope?: TransactionScope): Promise<number> {
    if (!isAddressState(state)) {
      throw new RangeError(`Unknown address state: ${String(state)}`);
    }
    if (addresses === null) {
      return this.write(scope, (repo) => repo.setState(null, state));
    }
    const bytes = parseAll(addresses).map((p) => p.bytes);
    if (bytes.length === 0) return 0;
    return this.write(scope, (repo) => repo.setState(bytes, state));
  }

  /** Unconditional insert-or-replace of a whole entry. Returns false for a malformed address. */
  async putEntry(entry: AddressEntryInput, scope?: TransactionScope): Promise<boolean> {
    const row = encodeEntry(entry);
    if (!row) {
      logger.debug({ address: entry.address }, "Ignoring malformed address");
      return false;
    }
    await this.write(scope, (repo) => repo.put(row));
    return true;
  }

  async getEntry(address: string, scope?: TransactionScope): Promise<AddressEntry | null> {
    const parsed = this.parse(address);
    if (!parsed) return null;
    const row = this.read(scope, (repo) => repo.findByAddress(parsed.bytes));
    return row ? decodeEntry(row) : null;
  }

  /** null when the address is malformed or not stored. */
  async getState(address: string, scope?: TransactionScope): Promise<AddressState | null> {
    const parsed = this.parse(address);
    if (!parsed) return null;
    const row = this.read(scope, (repo) => repo.findByAddress(parsed.bytes));
    return row ? decodeState(row.ipAddressText, row.state) : null;
  }

  /** null when the address is malformed or not stored; both ends null when it isn't banned. */
  async getBanWindow(address: string, scope?: TransactionScope): Promise<BanWindow | null> {
    const entry = await this.getEntry(address, scope);
    return entry ? { start: entry.banStartDate, end: entry.banEndDate } : null;
  }

  /**
   * Lazily enumerate entries in address order. Without a scope each page is
   * read separately, so rows changed mid-scan may or may not be seen.
   */
  async *enumerateEntries(filter: EntryFilter = {}, scope?: TransactionScope): AsyncGenerator<AddressEntry> {
    let after: Buffer | null = null;
    for (;;) {
      const page = this.read(scope, (repo) => repo.page(filter, after, this.settings.scanBatchSize));
      for (const row of page) {
        yield decodeEntry(row);
      }
      const last = page.at(-1);
      if (!last || page.length < this.settings.scanBatchSize) return;
      after = last.ipAddress;
    }
  }

  /** Addresses the firewall is currently enforcing. */
  async *enumerateBannedAddresses(scope?: TransactionScope): AsyncGenerator<string> {
    for await (const entry of this.enumerateEntries({ states: ["active"], banned: true }, scope)) {
      yield entry.address;
    }
  }

  async count(filter: EntryFilter = {}, scope?: TransactionScope): Promise<number> {
    return this.read(scope, (repo) => repo.count(filter));
  }

  /** Rows carrying a ban window, whatever their state. */
  async countBanned(scope?: TransactionScope): Promise<number> {
    return this.count({ banned: true }, scope);
  }

  async deleteAddress(address: string, scope?: TransactionScope): Promise<boolean> {
    const parsed = this.parse(address);
    if (!parsed) return false;
    return this.write(scope, (repo) => repo.delete(parsed.bytes));
  }

  async deleteAddresses(addresses: Iterable<string>, scope?: TransactionScope): Promise<number> {
    const parsed = parseAll(addresses);
    if (parsed.length === 0) return 0;
    return this.write(scope, (repo) => {
      let deleted = 0;
      for (const p of parsed) {
        if (repo.delete(p.bytes)) deleted++;
      }
      return deleted;
    });
  }

  /** Delete every address inside an inclusive range or CIDR block. Returns what was deleted. */
  async deleteRange(range: AddressRange, scope?: TransactionScope): Promise<string[]> {
    const bytes = parseRange(range);
    if (!bytes) {
      logger.debug({ range }, "Ignoring malformed address range");
      return [];
    }
    return this.write(scope, (repo) => repo.deleteRange(bytes));
  }

  /** Drop remove_pending rows without waiting for the firewall. */
  async deletePendingRemovals(scope?: TransactionScope): Promise<number> {
    return this.write(scope, (repo) => repo.deleteByState("remove_pending"));
  }

  /** Delete every row, keeping the file. Does nothing unless `confirm` is true. */
  async truncate(confirm: boolean, scope?: TransactionScope): Promise<number> {
    if (!confirm) return 0;
    const deleted = await this.write(scope, (repo) => repo.deleteAll());
    logger.warn({ deleted }, "Ban store truncated");
    return deleted;
  }

  // ---------------------------------------------------------------------------
  // Firewall sync surface
  // ---------------------------------------------------------------------------

  /**
   * Open a cursor over pending firewall deltas. Without a scope the cursor
   * owns a fresh one, holding the write lease until commit or rollback.
   */
  async openDeltaCursor(scope?: TransactionScope): Promise<DeltaCursor> {
    if (scope) {
      this.assertOpen();
      scope.assertOpen();
      return new DeltaCursor(scope, false, this.settings.scanBatchSize);
    }
    const own = await this.beginTransaction();
    return new DeltaCursor(own, true, this.settings.scanBatchSize);
  }

  /**
   * Yield every pending delta in address order; the caller applies each one
   * to the firewall before pulling the next. When the sequence runs to the
   * end and `commit` is set, the terminal transitions are applied and the
   * transaction is committed, a caller-supplied scope included; the summary
   * is the generator's return value. With `commit` unset a caller's scope
   * stays open. Stopping early or throwing
   * rolls back, so the same deltas come back next time.
   */
  async *enumerateDeltaAndUpdateState(
    options: ReconcileOptions,
  ): AsyncGenerator<FirewallDelta, ReconcileSummary | null, undefined> {
    const cursor = await this.openDeltaCursor(options.scope);
    let finished = false;
    try {
      for (const delta of cursor) {
        yield delta;
      }
      finished = true;
      if (!options.commit) {
        cursor.rollback();
        return null;
      }
      return cursor.commit({
        now: options.now,
        resetFailedLoginCount: options.resetFailedLoginCount ?? this.settings.resetFailedLoginCountOnUnban,
      });
    } finally {
      if (!finished) cursor.abort();
    }
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  private assertOpen(): void {
    if (this.closed) throw new StoreClosedError();
  }

  private parse(address: string): ParsedAddress | null {
    const parsed = parseAddress(address);
    if (!parsed) logger.debug({ address }, "Ignoring malformed address");
    return parsed;
  }

  private read<T>(scope: TransactionScope | undefined, fn: (repo: DrizzleIpAddressRepository) => T): T {
    this.assertOpen();
    if (scope) {
      scope.assertOpen();
      return fn(new DrizzleIpAddressRepository(scope.db));
    }
    return fn(new DrizzleIpAddressRepository(this.shared));
  }

  /**
   * Run `fn` atomically. Inside a caller's scope it joins that transaction and
   * leaves rollback to the caller; otherwise it takes the write lease and runs
   * in its own IMMEDIATE transaction, rolled back if `fn` throws.
   */
  private async write<T>(scope: TransactionScope | undefined, fn: (repo: DrizzleIpAddressRepository) => T): Promise<T> {
    this.assertOpen();
    if (scope) {
      scope.assertOpen();
      return fn(new DrizzleIpAddressRepository(scope.db));
    }

    const release = await this.gate.acquire();
    try {
      this.assertOpen();
      return this.shared.transaction((tx) => fn(new DrizzleIpAddressRepository(tx)), { behavior: "immediate" });
    } finally {
      release();
    }
  }
}
