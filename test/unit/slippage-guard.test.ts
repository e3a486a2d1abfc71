import { describe, it, expect } from "vitest";
import { SlippageGuard } from "../../src/engine/slippage-guard.js";
import { makeCtx } from "../helpers/fixtures.js";

const guard = new SlippageGuard({ maxSlippagePercent: 1, maxPriceImpactPercent: 2 });

describe("SlippageGuard", () => {
  it("allows a commit within both ceilings", async () => {
    expect(await guard.decide(makeCtx({ slippagePercent: 0.5, priceImpactPercent: 1.2 }))).toEqual({ type: "allow" });
  });

  it("blocks a requested slippage above the ceiling", async () => {
    const decision = await guard.decide(makeCtx({ slippagePercent: 1.5, priceImpactPercent: 0 }));
    expect(decision.type).toBe("block");
    if (decision.type !== "block") return;
    expect(decision.ruleId).toBe("slippage");
    expect(decision.reason).toBe("Requested slippage 1.5% exceeds maximum allowed 1%");
  });

  it("compares price impact by magnitude", async () => {
    const decision = await guard.decide(makeCtx({ slippagePercent: 0.5, priceImpactPercent: -3 }));
    expect(decision.type).toBe("block");
    if (decision.type !== "block") return;
    expect(decision.ruleId).toBe("price-impact");
    expect(decision.reason).toBe("Reported price impact -3% exceeds maximum allowed 2%");
  });

  it("allows a commit whose impact is unknown", async () => {
    expect(await guard.decide(makeCtx({ slippagePercent: 0.5 }))).toEqual({ type: "allow" });
  });

  it("does not check read calls", async () => {
    expect(await guard.decide(makeCtx({ actionKind: "read", slippagePercent: 50 }))).toEqual({ type: "allow" });
  });
});
