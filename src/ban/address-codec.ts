import { isIP } from "node:net";
import ipaddr from "ipaddr.js";
import type { IpAddressRow, NewIpAddressRow } from "../db/schema/ip-addresses.js";
import { type AddressState, CorruptEntryError, STATE_CODES, stateFromCode } from "./address-state.js";

export interface ParsedAddress {
  /** Network-order bytes: 4 for IPv4, 16 for IPv6 */
  bytes: Buffer;
  /** Canonical display form (RFC 5952 for IPv6, zone id dropped) */
  text: string;
  family: 4 | 6;
}

/** An address row as the rest of the application sees it. */
export interface AddressEntry {
  address: string;
  addressBytes: Buffer;
  lastFailedLogin: Date;
  failedLoginCount: number;
  /** Null when no ban window exists; banEndDate is then null too */
  banStartDate: Date | null;
  banEndDate: Date | null;
  state: AddressState;
}

/** Inclusive address range, either as explicit endpoints or CIDR notation. */
export type AddressRange = { begin: string; end: string } | string;

export interface ByteRange {
  begin: Buffer;
  end: Buffer;
}

/** Thrown when an entry handed to the store violates the ban-window invariants. */
export class InvalidEntryError extends Error {
  readonly name = "InvalidEntryError" as const;
}

function fromIpaddr(addr: ipaddr.IPv4 | ipaddr.IPv6): ParsedAddress {
  const bytes = addr.toByteArray();
  // Rebuilding from bytes drops any IPv6 zone id so one address has one text.
  const canonical = ipaddr.fromByteArray(bytes);
  return {
    bytes: Buffer.from(bytes),
    text: canonical.toString(),
    family: canonical.kind() === "ipv4" ? 4 : 6,
  };
}

/** Parse a textual address. Returns null for anything that isn't a literal IPv4/IPv6 address. */
export function parseAddress(input: string): ParsedAddress | null {
  const trimmed = input.trim();
  if (isIP(trimmed) === 0) return null;
  return fromIpaddr(ipaddr.parse(trimmed));
}

function maskBytes(bytes: number[], prefixLength: number, fill: 0 | 0xff): Buffer {
  return Buffer.from(
    bytes.map((byte, i) => {
      const bitsInByte = Math.min(8, Math.max(0, prefixLength - i * 8));
      const keep = (0xff << (8 - bitsInByte)) & 0xff;
      return (byte & keep) | (fill & ~keep & 0xff);
    }),
  );
}

/**
 * Resolve a range to inclusive byte endpoints of one family.
 * Returns null when either side is malformed or the families differ.
 */
export function parseRange(range: AddressRange): ByteRange | null {
  if (typeof range === "string") {
    let cidr: [ipaddr.IPv4 | ipaddr.IPv6, number];
    try {
      cidr = ipaddr.parseCIDR(range.trim());
    } catch {
      return null;
    }
    const [addr, prefixLength] = cidr;
    const bytes = addr.toByteArray();
    return { begin: maskBytes(bytes, prefixLength, 0), end: maskBytes(bytes, prefixLength, 0xff) };
  }

  const begin = parseAddress(range.begin);
  const end = parseAddress(range.end);
  if (!begin || !end || begin.family !== end.family) return null;
  return Buffer.compare(begin.bytes, end.bytes) <= 0
    ? { begin: begin.bytes, end: end.bytes }
    : { begin: end.bytes, end: begin.bytes };
}

export function toEpochMillis(date: Date): number {
  const ms = date.getTime();
  if (!Number.isFinite(ms)) throw new RangeError("Invalid date");
  return ms;
}

export function fromEpochMillis(ms: number): Date {
  return new Date(ms);
}

export function decodeState(address: string, code: number): AddressState {
  const state = stateFromCode(code);
  if (state === null) throw new CorruptEntryError(address, code);
  return state;
}

export function decodeEntry(row: IpAddressRow): AddressEntry {
  // A row without a ban start has no window, whatever the end column says.
  return {
    address: row.ipAddressText,
    addressBytes: row.ipAddress,
    lastFailedLogin: fromEpochMillis(row.lastFailedLogin),
    failedLoginCount: row.failedLoginCount,
    banStartDate: row.banDate !== null ? fromEpochMillis(row.banDate) : null,
    banEndDate: row.banDate !== null && row.banEndDate !== null ? fromEpochMillis(row.banEndDate) : null,
    state: decodeState(row.ipAddressText, row.state),
  };
}

export interface AddressEntryInput {
  address: string;
  lastFailedLogin: Date;
  failedLoginCount: number;
  banStartDate: Date | null;
  banEndDate: Date | null;
  state: AddressState;
}

/**
 * Encode an entry for storage. Returns null for a malformed address and
 * throws InvalidEntryError when the ban window contradicts the state.
 */
export function encodeEntry(entry: AddressEntryInput): NewIpAddressRow | null {
  const parsed = parseAddress(entry.address);
  if (!parsed) return null;

  if (!Number.isInteger(entry.failedLoginCount) || entry.failedLoginCount < 0) {
    throw new InvalidEntryError(`Failed login count must be a non-negative integer, got ${entry.failedLoginCount}`);
  }
  if ((entry.banStartDate === null) !== (entry.banEndDate === null)) {
    throw new InvalidEntryError(`Ban start and end must both be set or both be null for ${parsed.text}`);
  }
  if (entry.state === "failed_login" && entry.banStartDate !== null) {
    throw new InvalidEntryError(`failed_login entry ${parsed.text} cannot carry a ban window`);
  }
  if ((entry.state === "active" || entry.state === "add_pending") && entry.banStartDate === null) {
    throw new InvalidEntryError(`${entry.state} entry ${parsed.text} needs a ban window`);
  }

  return {
    ipAddress: parsed.bytes,
    ipAddressText: parsed.text,
    lastFailedLogin: toEpochMillis(entry.lastFailedLogin),
    failedLoginCount: entry.failedLoginCount,
    banDate: entry.banStartDate ? toEpochMillis(entry.banStartDate) : null,
    banEndDate: entry.banEndDate ? toEpochMillis(entry.banEndDate) : null,
    state: STATE_CODES[entry.state],
  };
}
