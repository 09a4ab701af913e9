/**
 * Address lifecycle state machine. Pure logic, no I/O.
 *
 * The store asks this module whether a mutation may touch a row and what a
 * row becomes when the firewall confirms a delta. `setState()` is an
 * administrative override and bypasses the graph on purpose.
 *
 * ```
 * (absent)         → add_pending, failed_login
 * failed_login     → add_pending                              (ban upsert)
 * add_pending      → active                                   (reconcile commit)
 * active           → active                                   (ban refresh)
 * remove_pending   → (deleted)                                (reconcile commit)
 * remove_pending_become_failed_login → failed_login           (reconcile commit)
 * ```
 */

export const ADDRESS_STATES = [
  "active",
  "add_pending",
  "remove_pending",
  "failed_login",
  "remove_pending_become_failed_login",
] as const;

export type AddressState = (typeof ADDRESS_STATES)[number];

/** Persisted integer code for each state. Part of the file format; never renumber. */
export const STATE_CODES: Record<AddressState, number> = {
  active: 0,
  add_pending: 1,
  remove_pending: 2,
  failed_login: 3,
  remove_pending_become_failed_login: 4,
};

/** States that still owe the firewall an add or a remove. */
export const PENDING_STATES: readonly AddressState[] = [
  "add_pending",
  "remove_pending",
  "remove_pending_become_failed_login",
];

export function isAddressState(value: unknown): value is AddressState {
  return typeof value === "string" && (ADDRESS_STATES as readonly string[]).includes(value);
}

export function stateFromCode(code: number): AddressState | null {
  for (const state of ADDRESS_STATES) {
    if (STATE_CODES[state] === code) return state;
  }
  return null;
}

/** Only rows accumulating failures take counter increments; banned rows are frozen. */
export function acceptsFailedLogin(state: AddressState): boolean {
  return state === "failed_login";
}

/** The slice of an entry the ban guard looks at. */
export interface BanGuardInput {
  state: AddressState;
  /** Epoch millis, or null when the row has no ban window */
  banEndDate: number | null;
}

/**
 * Whether a ban upsert may overwrite an existing row's ban window.
 * Refuses rows already queued for removal and bans that are still running;
 * a lapsed or absent ban window may be reopened.
 */
export function canReplaceBan(current: BanGuardInput, nowMs: number): boolean {
  if (current.state === "remove_pending") return false;
  return current.banEndDate === null || current.banEndDate <= nowMs;
}

/** State after a successful ban upsert: an enforced ban stays enforced, anything else needs the firewall. */
export function stateAfterBan(current: AddressState | null): AddressState {
  return current === "active" ? "active" : "add_pending";
}

/** What a confirmed delta does to its row. */
export type ReconcileOutcome = { kind: "transition"; to: AddressState } | { kind: "delete" } | { kind: "none" };

export function reconcileOutcome(state: AddressState): ReconcileOutcome {
  switch (state) {
    case "add_pending":
      return { kind: "transition", to: "active" };
    case "remove_pending_become_failed_login":
      return { kind: "transition", to: "failed_login" };
    case "remove_pending":
      return { kind: "delete" };
    case "active":
    case "failed_login":
      return { kind: "none" };
  }
}

/** Thrown when a persisted row carries a state code this build doesn't know. */
export class CorruptEntryError extends Error {
  readonly name = "CorruptEntryError" as const;
  constructor(address: string, code: number) {
    super(`Unknown state code ${code} stored for ${address}`);
  }
}
