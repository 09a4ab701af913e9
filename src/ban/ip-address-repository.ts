import type { IpAddressRow, NewIpAddressRow } from "../db/schema/ip-addresses.js";
import type { ByteRange, ParsedAddress } from "./address-codec.js";
import type { AddressState } from "./address-state.js";

export type { IpAddressRow, NewIpAddressRow };

/**
 * Row selection for scans and counts. Cutoffs are alternatives (OR);
 * `states` and `banned` narrow whatever the cutoffs selected (AND).
 * An empty filter selects every row.
 */
export interface EntryFilter {
  /** failed_login rows whose last failure is at or before this */
  failedLoginCutoff?: Date;
  /** active/add_pending rows whose ban ends at or before this */
  banCutoff?: Date;
  states?: readonly AddressState[];
  /** true: rows with a ban start date; false: rows without one */
  banned?: boolean;
}

export interface DeltaRow {
  ipAddress: Buffer;
  ipAddressText: string;
  state: AddressState;
}

export interface ReconcileCounts {
  /** add_pending rows now active */
  activated: number;
  /** remove_pending_become_failed_login rows now failed_login */
  demoted: number;
  /** remove_pending rows deleted */
  deleted: number;
}

/**
 * Record store over the ip_addresses table.
 *
 * Implementations run against whatever executor they were built with and
 * never open transactions themselves. Methods that read then write
 * (upsertBan, incrementFailedLogin, deleteRange, commitDeltas) are only
 * atomic when the caller runs them inside a transaction.
 */
export interface IIpAddressRepository {
  findByAddress(address: Buffer): IpAddressRow | null;
  /** Unconditional insert-or-replace of a whole row. */
  put(row: NewIpAddressRow): void;
  /** Conditional ban upsert. Returns rows affected (0 or 1). */
  upsertBan(address: ParsedAddress, banDate: number, banEndDate: number, now: number): number;
  /** Returns the stored count after the attempt, changed or not. */
  incrementFailedLogin(address: ParsedAddress, when: number, amount: number): number;
  /** `null` targets every row. */
  setState(addresses: readonly Buffer[] | null, state: AddressState): number;
  delete(address: Buffer): boolean;
  deleteAll(): number;
  deleteByState(state: AddressState): number;
  /** Deletes and returns the canonical text of every address inside `range`, address-ordered. */
  deleteRange(range: ByteRange): string[];
  /** Keyset page ordered by address bytes, starting after `after`. */
  page(filter: EntryFilter, after: Buffer | null, limit: number): IpAddressRow[];
  pageDeltas(after: Buffer | null, limit: number): DeltaRow[];
  count(filter?: EntryFilter): number;
  /** Terminal transitions for every pending row. */
  commitDeltas(resetFailedLoginCount: boolean, now: number): ReconcileCounts;
}
