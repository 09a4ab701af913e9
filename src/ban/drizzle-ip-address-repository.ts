import { and, asc, between, count, eq, gt, inArray, isNotNull, isNull, lte, or, type SQL, sql } from "drizzle-orm";
import type { SqliteExecutor } from "../db/index.js";
import { ipAddresses } from "../db/schema/ip-addresses.js";
import { type ByteRange, decodeState, type ParsedAddress } from "./address-codec.js";
import {
  type AddressState,
  acceptsFailedLogin,
  canReplaceBan,
  PENDING_STATES,
  reconcileOutcome,
  STATE_CODES,
  stateAfterBan,
} from "./address-state.js";
import type {
  DeltaRow,
  EntryFilter,
  IIpAddressRepository,
  IpAddressRow,
  NewIpAddressRow,
  ReconcileCounts,
} from "./ip-address-repository.js";

// Stay well under SQLite's bound-parameter limit.
const IN_CHUNK_SIZE = 500;

function chunk<T>(items: readonly T[], size: number): T[][] {
  const out: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    out.push(items.slice(i, i + size));
  }
  return out;
}

function whereFor(filter: EntryFilter, after: Buffer | null = null): SQL | undefined {
  const cutoffs: Array<SQL | undefined> = [];
  if (filter.failedLoginCutoff) {
    cutoffs.push(
      and(
        eq(ipAddresses.state, STATE_CODES.failed_login),
        lte(ipAddresses.lastFailedLogin, filter.failedLoginCutoff.getTime()),
      ),
    );
  }
  if (filter.banCutoff) {
    cutoffs.push(
      and(
        inArray(ipAddresses.state, [STATE_CODES.active, STATE_CODES.add_pending]),
        lte(ipAddresses.banEndDate, filter.banCutoff.getTime()),
      ),
    );
  }

  const clauses: Array<SQL | undefined> = [];
  if (cutoffs.length > 0) clauses.push(or(...cutoffs));
  if (filter.states) {
    const codes = filter.states.map((s) => STATE_CODES[s]);
    // inArray() with an empty list matches nothing, which is what an empty state list means.
    clauses.push(inArray(ipAddresses.state, codes));
  }
  if (filter.banned === true) clauses.push(isNotNull(ipAddresses.banDate));
  if (filter.banned === false) clauses.push(isNull(ipAddresses.banDate));
  if (after) clauses.push(gt(ipAddresses.ipAddress, after));

  return and(...clauses);
}

export class DrizzleIpAddressRepository implements IIpAddressRepository {
  constructor(private readonly db: SqliteExecutor) {}

  findByAddress(address: Buffer): IpAddressRow | null {
    return this.db.select().from(ipAddresses).where(eq(ipAddresses.ipAddress, address)).get() ?? null;
  }

  put(row: NewIpAddressRow): void {
    this.db
      .insert(ipAddresses)
      .values(row)
      .onConflictDoUpdate({
        target: ipAddresses.ipAddress,
        set: {
          ipAddressText: row.ipAddressText,
          lastFailedLogin: row.lastFailedLogin,
          failedLoginCount: row.failedLoginCount,
          banDate: row.banDate ?? null,
          banEndDate: row.banEndDate ?? null,
          state: row.state,
        },
      })
      .run();
  }

  upsertBan(address: ParsedAddress, banDate: number, banEndDate: number, now: number): number {
    const existing = this.findByAddress(address.bytes);

    if (!existing) {
      this.db
        .insert(ipAddresses)
        .values({
          ipAddress: address.bytes,
          ipAddressText: address.text,
          lastFailedLogin: banDate,
          failedLoginCount: 0,
          banDate,
          banEndDate,
          state: STATE_CODES[stateAfterBan(null)],
        })
        .run();
      return 1;
    }

    const current = decodeState(existing.ipAddressText, existing.state);
    if (!canReplaceBan({ state: current, banEndDate: existing.banEndDate }, now)) {
      return 0;
    }

    // CAS on the state we just read so a change underneath us affects nothing.
    const result = this.db
      .update(ipAddresses)
      .set({ banDate, banEndDate, state: STATE_CODES[stateAfterBan(current)] })
      .where(and(eq(ipAddresses.ipAddress, address.bytes), eq(ipAddresses.state, existing.state)))
      .run();
    return result.changes;
  }

  incrementFailedLogin(address: ParsedAddress, when: number, amount: number): number {
    const existing = this.findByAddress(address.bytes);

    if (!existing) {
      this.db
        .insert(ipAddresses)
        .values({
          ipAddress: address.bytes,
          ipAddressText: address.text,
          lastFailedLogin: when,
          failedLoginCount: amount,
          banDate: null,
          banEndDate: null,
          state: STATE_CODES.failed_login,
        })
        .run();
      return amount;
    }

    const current = decodeState(existing.ipAddressText, existing.state);
    if (!acceptsFailedLogin(current)) {
      return existing.failedLoginCount;
    }

    const updated = this.db
      .update(ipAddresses)
      .set({
        failedLoginCount: sql`${ipAddresses.failedLoginCount} + ${amount}`,
        // Never moves backwards: a late report of an older failure keeps the newer timestamp.
        lastFailedLogin: sql`MAX(${ipAddresses.lastFailedLogin}, ${when})`,
      })
      .where(and(eq(ipAddresses.ipAddress, address.bytes), eq(ipAddresses.state, STATE_CODES.failed_login)))
      .returning({ failedLoginCount: ipAddresses.failedLoginCount })
      .get();

    return updated?.failedLoginCount ?? existing.failedLoginCount;
  }

  setState(addresses: readonly Buffer[] | null, state: AddressState): number {
    const code = STATE_CODES[state];
    if (addresses === null) {
      return this.db.update(ipAddresses).set({ state: code }).run().changes;
    }

    let changes = 0;
    for (const batch of chunk(addresses, IN_CHUNK_SIZE)) {
      const result = this.db.update(ipAddresses).set({ state: code }).where(inArray(ipAddresses.ipAddress, batch)).run();
      changes += result.changes;
    }
    return changes;
  }

  delete(address: Buffer): boolean {
    return this.db.delete(ipAddresses).where(eq(ipAddresses.ipAddress, address)).run().changes > 0;
  }

  deleteAll(): number {
    return this.db.delete(ipAddresses).run().changes;
  }

  deleteByState(state: AddressState): number {
    return this.db.delete(ipAddresses).where(eq(ipAddresses.state, STATE_CODES[state])).run().changes;
  }

  deleteRange(range: ByteRange): string[] {
    // Blob comparison is memcmp-then-length, so pin the family by length as well.
    const inRange = and(
      between(ipAddresses.ipAddress, range.begin, range.end),
      sql`length(${ipAddresses.ipAddress}) = ${range.begin.length}`,
    );

    const doomed = this.db
      .select({ text: ipAddresses.ipAddressText })
      .from(ipAddresses)
      .where(inRange)
      .orderBy(asc(ipAddresses.ipAddress))
      .all();
    if (doomed.length === 0) return [];

    this.db.delete(ipAddresses).where(inRange).run();
    return doomed.map((r) => r.text);
  }

  page(filter: EntryFilter, after: Buffer | null, limit: number): IpAddressRow[] {
    return this.db
      .select()
      .from(ipAddresses)
      .where(whereFor(filter, after))
      .orderBy(asc(ipAddresses.ipAddress))
      .limit(limit)
      .all();
  }

  pageDeltas(after: Buffer | null, limit: number): DeltaRow[] {
    const rows = this.db
      .select({ ipAddress: ipAddresses.ipAddress, ipAddressText: ipAddresses.ipAddressText, state: ipAddresses.state })
      .from(ipAddresses)
      .where(whereFor({ states: PENDING_STATES }, after))
      .orderBy(asc(ipAddresses.ipAddress))
      .limit(limit)
      .all();

    return rows.map((r) => ({
      ipAddress: r.ipAddress,
      ipAddressText: r.ipAddressText,
      state: decodeState(r.ipAddressText, r.state),
    }));
  }

  count(filter: EntryFilter = {}): number {
    const row = this.db.select({ count: count() }).from(ipAddresses).where(whereFor(filter)).get();
    return row?.count ?? 0;
  }

  commitDeltas(resetFailedLoginCount: boolean, now: number): ReconcileCounts {
    const counts: ReconcileCounts = { activated: 0, demoted: 0, deleted: 0 };

    for (const state of PENDING_STATES) {
      const outcome = reconcileOutcome(state);
      const code = STATE_CODES[state];

      if (outcome.kind === "delete") {
        counts.deleted += this.db.delete(ipAddresses).where(eq(ipAddresses.state, code)).run().changes;
        continue;
      }
      if (outcome.kind !== "transition") continue;

      // The reset flag applies to every confirmed transition, not only demotions.
      const result = this.db
        .update(ipAddresses)
        .set({
          state: STATE_CODES[outcome.to],
          ...(resetFailedLoginCount ? { failedLoginCount: 0 } : {}),
          // A demoted row starts counting afresh and carries no ban window.
          ...(outcome.to === "failed_login" ? { lastFailedLogin: now, banDate: null, banEndDate: null } : {}),
        })
        .where(eq(ipAddresses.state, code))
        .run();

      if (outcome.to === "active") counts.activated += result.changes;
      else counts.demoted += result.changes;
    }

    return counts;
  }
}
