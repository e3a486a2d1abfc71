import { describe, it, expect } from "vitest";
import { MemorySpendLedger, type ReserveRequest } from "../../src/engine/spend-ledger.js";
import { SpendLimitTracker, type SpendLimitConfig } from "../../src/engine/spend-limit.js";
import type { InterceptorDecision } from "../../src/engine/types.js";
import { silentLogger } from "../../src/logger.js";
import { FakeClock, makeCtx, seededRandom } from "../helpers/fixtures.js";

function createTracker(cfg: Partial<SpendLimitConfig> = {}, clock = new FakeClock(Date.parse("2026-03-10T12:00:00Z"))) {
  const tracker = new SpendLimitTracker(
    { maxPerTradeUsd: 600, maxDailyUsd: 1000, unpricedTradePolicy: "fail-closed", ...cfg },
    new MemorySpendLedger(),
    silentLogger(),
    clock.now
  );
  return { tracker, clock };
}

async function commit(tracker: SpendLimitTracker, valueUsd: number): Promise<InterceptorDecision> {
  const ctx = makeCtx({ tradeValueUsd: valueUsd });
  const decision = await tracker.decide(ctx);
  if (decision.type === "allow") await tracker.record(ctx);
  return decision;
}

describe("SpendLimitTracker", () => {
  it("admits trades up to the daily cap and blocks the next one", async () => {
    const { tracker } = createTracker();

    expect((await commit(tracker, 500)).type).toBe("allow");
    expect(tracker.snapshot().totalUsd).toBe(500);

    expect((await commit(tracker, 500)).type).toBe("allow");
    expect(tracker.snapshot().totalUsd).toBe(1000);

    const third = await commit(tracker, 1);
    expect(third.type).toBe("block");
    if (third.type !== "block") return;
    expect(third.ruleId).toBe("daily");
    expect(third.reason).toBe("Trade would exceed daily limit. Current: $1000.00, This trade: $1.00, Limit: $1000.00");
    expect(third.error.toPayload().details).toEqual({ limit: "daily", observed: 1001, ceiling: 1000 });
    expect(tracker.snapshot().totalUsd).toBe(1000);
  });

  it("blocks a single trade above the per-trade cap", async () => {
    const { tracker } = createTracker();
    const decision = await commit(tracker, 601);

    expect(decision.type).toBe("block");
    if (decision.type !== "block") return;
    expect(decision.ruleId).toBe("per-trade");
    expect(decision.reason).toBe("Trade value $601.00 exceeds per-trade limit of $600.00");
    expect(tracker.snapshot().totalUsd).toBe(0);
  });

  it("starts a fresh total after the UTC date changes", async () => {
    const clock = new FakeClock(Date.parse("2026-03-10T23:59:59Z"));
    const { tracker } = createTracker({ maxPerTradeUsd: 1000 }, clock);

    expect((await commit(tracker, 900)).type).toBe("allow");
    expect(tracker.snapshot()).toMatchObject({ day: "2026-03-10", totalUsd: 900 });

    clock.set("2026-03-11T00:00:01Z");
    expect((await commit(tracker, 900)).type).toBe("allow");
    expect(tracker.snapshot()).toMatchObject({ day: "2026-03-11", totalUsd: 900 });
  });

  it("does not carry a reservation confirmed after midnight into the new day", async () => {
    const clock = new FakeClock(Date.parse("2026-03-10T23:59:59Z"));
    const { tracker } = createTracker({}, clock);

    const lateCall = makeCtx({ tradeValueUsd: 300 });
    expect((await tracker.decide(lateCall)).type).toBe("allow");

    clock.set("2026-03-11T00:00:01Z");
    expect((await commit(tracker, 100)).type).toBe("allow");
    await tracker.record(lateCall);

    expect(tracker.snapshot()).toMatchObject({ day: "2026-03-11", totalUsd: 100, pendingUsd: 0 });
  });

  it("never touches state for read-only calls, whatever their value", async () => {
    const { tracker } = createTracker();
    const ctx = makeCtx({ actionKind: "read", tradeValueUsd: 50_000 });

    expect(await tracker.decide(ctx)).toEqual({ type: "allow" });
    await tracker.record(ctx);
    await tracker.release(ctx);

    expect(tracker.snapshot()).toMatchObject({ totalUsd: 0, pendingUsd: 0, history: [] });
  });

  it("holds a reservation until record and drops it on release", async () => {
    const { tracker } = createTracker();
    const kept = makeCtx({ tradeValueUsd: 200 });
    const dropped = makeCtx({ tradeValueUsd: 300 });

    await tracker.decide(kept);
    await tracker.decide(dropped);
    expect(tracker.snapshot()).toMatchObject({ totalUsd: 0, pendingUsd: 500 });

    await tracker.release(dropped);
    await tracker.record(kept);
    expect(tracker.snapshot()).toMatchObject({ totalUsd: 200, pendingUsd: 0 });

    // A released call can no longer be recorded.
    await tracker.record(dropped);
    expect(tracker.snapshot().totalUsd).toBe(200);
  });

  it("blocks unpriced trades under fail-closed", async () => {
    const { tracker } = createTracker({ unpricedTradePolicy: "fail-closed" });
    const decision = await tracker.decide(makeCtx());

    expect(decision.type).toBe("block");
    if (decision.type !== "block") return;
    expect(decision.ruleId).toBe("unpriced");
  });

  it("admits unpriced trades under fail-open without reserving", async () => {
    const { tracker } = createTracker({ unpricedTradePolicy: "fail-open" });
    const ctx = makeCtx();

    expect(await tracker.decide(ctx)).toEqual({ type: "allow" });
    await tracker.record(ctx);
    expect(tracker.snapshot()).toMatchObject({ totalUsd: 0, pendingUsd: 0 });
  });

  it("rejects non-positive limits", () => {
    expect(() => createTracker({ maxDailyUsd: 0 })).toThrow(RangeError);
  });

  it("admits exactly the subset that fits under the cap for concurrent commits", async () => {
    const rand = seededRandom(0x5eed);

    for (let round = 0; round < 10; round++) {
      const { tracker } = createTracker();
      const values = Array.from({ length: 20 }, () => Math.round(rand() * 69_900 + 100) / 100);
      const contexts = values.map((v) => makeCtx({ tradeValueUsd: v }));

      // Reservations are taken in arrival order, so the admitted subset is
      // the greedy prefix-fit of the arrival sequence.
      const expected: string[] = [];
      let acc = 0;
      values.forEach((v, i) => {
        if (v > 600 || acc + v > 1000) return;
        acc += v;
        expected.push(contexts[i].callId);
      });

      const decisions = await Promise.all(contexts.map((ctx) => tracker.decide(ctx)));
      const admitted = contexts.filter((_, i) => decisions[i].type === "allow");
      await Promise.all(admitted.map((ctx) => tracker.record(ctx)));

      expect(admitted.map((c) => c.callId)).toEqual(expected);
      expect(admitted.length).toBeLessThan(values.length);
      for (const ctx of admitted) expect(ctx.tradeValueUsd).toBeLessThanOrEqual(600);

      const snapshot = tracker.snapshot();
      expect(snapshot.totalUsd).toBe(acc);
      expect(snapshot.totalUsd).toBeLessThanOrEqual(1000);
      expect(snapshot.pendingUsd).toBe(0);
    }
  });
});

describe("MemorySpendLedger", () => {
  const reserve = (callId: string, amountUsd: number, iso: string): ReserveRequest => ({
    callId,
    amountUsd,
    day: iso.slice(0, 10),
    now: Date.parse(iso),
    maxPerTradeUsd: 600,
    maxDailyUsd: 1000,
  });

  it("keeps a confirm after midnight on the day it was reserved", () => {
    const ledger = new MemorySpendLedger();
    ledger.reserve(reserve("late", 250, "2026-03-10T23:59:59Z"));
    ledger.reserve(reserve("early", 100, "2026-03-11T00:00:01Z"));

    expect(ledger.confirm("late", Date.parse("2026-03-11T00:00:02Z"))).toEqual({ state: "stale-day", day: "2026-03-10" });
    expect(ledger.confirm("early", Date.parse("2026-03-11T00:00:03Z"))).toEqual({
      state: "confirmed",
      day: "2026-03-11",
      totalUsd: 100,
    });

    expect(ledger.snapshot("2026-03-10")).toMatchObject({ totalUsd: 250, pendingUsd: 0 });
    expect(ledger.snapshot("2026-03-11")).toMatchObject({ totalUsd: 100, pendingUsd: 0 });
  });

  it("forgets a closed day once nothing is pending on it", () => {
    const ledger = new MemorySpendLedger();
    ledger.reserve(reserve("a", 200, "2026-03-10T12:00:00Z"));
    ledger.confirm("a", Date.parse("2026-03-10T12:00:01Z"));
    ledger.reserve(reserve("b", 100, "2026-03-11T12:00:00Z"));

    expect(ledger.snapshot("2026-03-10").totalUsd).toBe(0);
    expect(ledger.snapshot("2026-03-11")).toMatchObject({ totalUsd: 0, pendingUsd: 100 });
  });
});
