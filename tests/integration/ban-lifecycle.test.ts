/**
 * End-to-end lifecycle of one address through the public BanStore surface:
 * failed logins, ban, firewall add, unban, firewall remove.
 */
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { BanStore, type FirewallDelta, type ReconcileSummary } from "../../src/index.js";

vi.mock("../../src/config/logger.js", () => ({
  logger: { info: vi.fn(), error: vi.fn(), warn: vi.fn(), debug: vi.fn() },
}));

const MINUTE = 60_000;
const T0 = Date.UTC(2024, 5, 1, 12);
const t = (minutes: number) => new Date(T0 + minutes * MINUTE);

async function reconcile(
  store: BanStore,
  commit: boolean,
  now: Date,
): Promise<{ deltas: FirewallDelta[]; summary: ReconcileSummary | null }> {
  const gen = store.enumerateDeltaAndUpdateState({ commit, now });
  const deltas: FirewallDelta[] = [];
  for (;;) {
    const step = await gen.next();
    if (step.done) return { deltas, summary: step.value };
    deltas.push(step.value);
  }
}

describe("ban lifecycle", () => {
  let store: BanStore;

  beforeEach(() => {
    store = BanStore.open({ path: ":memory:" });
  });

  afterEach(() => {
    store.close();
  });

  it("counts failures, bans, adds to the firewall, then removes", async () => {
    expect(await store.incrementFailedLogin("10.0.0.1", t(0))).toBe(1);
    expect(await store.incrementFailedLogin("10.0.0.1", t(1))).toBe(2);
    expect(await store.incrementFailedLogin("10.0.0.1", t(2))).toBe(3);
    expect(await store.getState("10.0.0.1")).toBe("failed_login");

    expect(await store.applyBan("10.0.0.1", t(10), t(20), t(10))).toBe(1);
    expect(await store.getState("10.0.0.1")).toBe("add_pending");
    expect(await store.getBanWindow("10.0.0.1")).toEqual({ start: t(10), end: t(20) });
    expect(await store.incrementFailedLogin("10.0.0.1", t(11))).toBe(3);

    const added = await reconcile(store, true, t(10));
    expect(added.deltas).toEqual([{ address: "10.0.0.1", added: true }]);
    expect(await store.getState("10.0.0.1")).toBe("active");
    expect((await store.getEntry("10.0.0.1"))?.failedLoginCount).toBe(0);

    expect(await store.setState(["10.0.0.1"], "remove_pending")).toBe(1);
    const removed = await reconcile(store, true, t(21));
    expect(removed.deltas).toEqual([{ address: "10.0.0.1", added: false }]);
    expect(removed.summary).toEqual({ added: 0, removed: 1, activated: 0, demoted: 0, deleted: 1 });
    expect(await store.getEntry("10.0.0.1")).toBeNull();
  });

  it("a second ban inside a running window is a no-op", async () => {
    expect(await store.applyBan("10.0.0.1", t(10), t(20), t(10))).toBe(1);
    expect(await store.applyBan("10.0.0.1", t(12), t(30), t(12))).toBe(0);
    expect(await store.getBanWindow("10.0.0.1")).toEqual({ start: t(10), end: t(20) });
  });

  it("declined reconciliation leaves the same deltas for the next run", async () => {
    await store.applyBan("10.0.0.2", t(0), t(10), t(0));
    await store.applyBan("10.0.0.1", t(0), t(10), t(0));

    const declined = await reconcile(store, false, t(1));
    const again = await reconcile(store, false, t(2));
    expect(again.deltas).toEqual(declined.deltas);
    expect(again.deltas.map((d) => d.address)).toEqual(["10.0.0.1", "10.0.0.2"]);

    const committed = await reconcile(store, true, t(3));
    expect(committed.summary?.activated).toBe(2);
    expect((await reconcile(store, true, t(4))).deltas).toEqual([]);
  });

  it("an expired ban goes back to counting failures", async () => {
    await store.incrementFailedLogin("10.0.0.1", t(0), 5);
    await store.applyBan("10.0.0.1", t(1), t(5), t(1));
    await reconcile(store, true, t(1));

    const expired: string[] = [];
    for await (const entry of store.enumerateEntries({ banCutoff: t(6) })) {
      expired.push(entry.address);
    }
    expect(expired).toEqual(["10.0.0.1"]);

    await store.setState(expired, "remove_pending_become_failed_login");
    const { deltas } = await reconcile(store, true, t(6));
    expect(deltas).toEqual([{ address: "10.0.0.1", added: false }]);
    expect(await store.getEntry("10.0.0.1")).toMatchObject({
      state: "failed_login",
      failedLoginCount: 0,
      lastFailedLogin: t(6),
    });
    expect(await store.getBanWindow("10.0.0.1")).toEqual({ start: null, end: null });
    expect(await store.countBanned()).toBe(0);
    expect(await store.incrementFailedLogin("10.0.0.1", t(7))).toBe(1);

    expect(await store.applyBan("10.0.0.1", t(8), t(18), t(8))).toBe(1);
    expect(await store.getState("10.0.0.1")).toBe("add_pending");
  });

  it("an unban before the window ends leaves an address that can be banned again", async () => {
    await store.applyBan("10.0.0.2", t(10), t(100), t(10));
    await reconcile(store, true, t(10));
    await store.setState(["10.0.0.2"], "remove_pending_become_failed_login");
    await reconcile(store, true, t(12));

    const entry = await store.getEntry("10.0.0.2");
    expect(entry).toMatchObject({ state: "failed_login", banStartDate: null, banEndDate: null });
    if (!entry) throw new Error("entry missing");
    expect(await store.putEntry(entry)).toBe(true);

    expect(await store.applyBan("10.0.0.2", t(13), t(23), t(13))).toBe(1);
    expect(await store.getBanWindow("10.0.0.2")).toEqual({ start: t(13), end: t(23) });
  });

  it("round-trips an entry at millisecond precision", async () => {
    const entry = {
      address: "2001:db8::42",
      lastFailedLogin: new Date(T0 + 123),
      failedLoginCount: 9,
      banStartDate: new Date(T0 + 456),
      banEndDate: new Date(T0 + 789),
      state: "active" as const,
    };
    expect(await store.putEntry(entry)).toBe(true);
    expect(await store.getEntry("2001:db8::42")).toEqual({
      ...entry,
      addressBytes: Buffer.from([0x20, 0x01, 0x0d, 0xb8, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0, 0x42]),
    });
  });
});
