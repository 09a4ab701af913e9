import { describe, expect, it } from "vitest";
import {
  ADDRESS_STATES,
  acceptsFailedLogin,
  CorruptEntryError,
  canReplaceBan,
  isAddressState,
  PENDING_STATES,
  reconcileOutcome,
  STATE_CODES,
  stateAfterBan,
  stateFromCode,
} from "./address-state.js";

describe("STATE_CODES", () => {
  it("keeps the persisted numbering", () => {
    expect(STATE_CODES).toEqual({
      active: 0,
      add_pending: 1,
      remove_pending: 2,
      failed_login: 3,
      remove_pending_become_failed_login: 4,
    });
  });

  it("round-trips every state through its code", () => {
    for (const state of ADDRESS_STATES) {
      expect(stateFromCode(STATE_CODES[state])).toBe(state);
    }
  });

  it("returns null for an unknown code", () => {
    expect(stateFromCode(5)).toBeNull();
    expect(stateFromCode(-1)).toBeNull();
  });
});

describe("isAddressState", () => {
  it("accepts known states and rejects anything else", () => {
    expect(isAddressState("add_pending")).toBe(true);
    expect(isAddressState("banned")).toBe(false);
    expect(isAddressState(1)).toBe(false);
  });
});

describe("PENDING_STATES", () => {
  it("lists the three states that owe the firewall a change", () => {
    expect(PENDING_STATES).toEqual([
      "add_pending",
      "remove_pending",
      "remove_pending_become_failed_login",
    ]);
  });
});

describe("acceptsFailedLogin", () => {
  it("only counts failures for failed_login rows", () => {
    expect(ADDRESS_STATES.filter(acceptsFailedLogin)).toEqual(["failed_login"]);
  });
});

describe("canReplaceBan", () => {
  const now = 10_000;

  it("allows a row with no ban window", () => {
    expect(canReplaceBan({ state: "failed_login", banEndDate: null }, now)).toBe(true);
  });

  it("allows a ban that ended exactly now", () => {
    expect(canReplaceBan({ state: "active", banEndDate: now }, now)).toBe(true);
  });

  it("allows a lapsed ban", () => {
    expect(canReplaceBan({ state: "add_pending", banEndDate: now - 1 }, now)).toBe(true);
  });

  it("refuses a ban that is still running", () => {
    expect(canReplaceBan({ state: "active", banEndDate: now + 1 }, now)).toBe(false);
    expect(canReplaceBan({ state: "add_pending", banEndDate: now + 1 }, now)).toBe(false);
  });

  it("refuses remove_pending even when the window has lapsed", () => {
    expect(canReplaceBan({ state: "remove_pending", banEndDate: null }, now)).toBe(false);
    expect(canReplaceBan({ state: "remove_pending", banEndDate: now - 1 }, now)).toBe(false);
  });

  it("allows remove_pending_become_failed_login once its window has lapsed", () => {
    expect(canReplaceBan({ state: "remove_pending_become_failed_login", banEndDate: now - 1 }, now)).toBe(true);
  });
});

describe("stateAfterBan", () => {
  it("keeps an enforced ban active", () => {
    expect(stateAfterBan("active")).toBe("active");
  });

  it("queues everything else for the firewall", () => {
    expect(stateAfterBan(null)).toBe("add_pending");
    expect(stateAfterBan("failed_login")).toBe("add_pending");
    expect(stateAfterBan("add_pending")).toBe("add_pending");
    expect(stateAfterBan("remove_pending_become_failed_login")).toBe("add_pending");
  });
});

describe("reconcileOutcome", () => {
  it("activates pending adds", () => {
    expect(reconcileOutcome("add_pending")).toEqual({ kind: "transition", to: "active" });
  });

  it("demotes tiered removals to failed_login", () => {
    expect(reconcileOutcome("remove_pending_become_failed_login")).toEqual({ kind: "transition", to: "failed_login" });
  });

  it("deletes plain removals", () => {
    expect(reconcileOutcome("remove_pending")).toEqual({ kind: "delete" });
  });

  it("leaves settled rows alone", () => {
    expect(reconcileOutcome("active")).toEqual({ kind: "none" });
    expect(reconcileOutcome("failed_login")).toEqual({ kind: "none" });
  });
});

describe("CorruptEntryError", () => {
  it("names the address and the code", () => {
    const err = new CorruptEntryError("10.0.0.1", 9);
    expect(err.name).toBe("CorruptEntryError");
    expect(err.message).toBe("Unknown state code 9 stored for 10.0.0.1");
  });
});
