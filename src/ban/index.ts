export type { AddressEntry, AddressEntryInput, AddressRange, ParsedAddress } from "./address-codec.js";
export { InvalidEntryError, parseAddress, parseRange } from "./address-codec.js";
export type { AddressState } from "./address-state.js";
export { ADDRESS_STATES, CorruptEntryError } from "./address-state.js";
export type { BanRequest, BanStoreOptions, BanWindow, ReconcileOptions } from "./ban-store.js";
export { BanStore, StoreClosedError } from "./ban-store.js";
export type { DeltaCommitOptions, DeltaCursorStatus, FirewallDelta, ReconcileSummary } from "./delta-cursor.js";
export { DeltaCursor, DeltaCursorClosedError, IncompleteDeltaError } from "./delta-cursor.js";
export type { EntryFilter, ReconcileCounts } from "./ip-address-repository.js";
export type { ScopeStatus } from "./transaction-scope.js";
export { TransactionClosedError, TransactionScope } from "./transaction-scope.js";
