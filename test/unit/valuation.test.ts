import { describe, it, expect } from "vitest";
import { silentLogger } from "../../src/logger.js";
import { TokenTable } from "../../src/pricing/tokens.js";
import { StaticPriceSource, TradeValuator, type PriceSource } from "../../src/pricing/valuation.js";
import { BASE_USDC, ETH_WETH } from "../helpers/fixtures.js";

const tokens = TokenTable.load();

function valuator(priceSource?: PriceSource, lookupTimeoutMs = 1_000) {
  return new TradeValuator(tokens, silentLogger(), { priceSource, lookupTimeoutMs });
}

describe("TokenTable", () => {
  it("looks tokens up per network, case-insensitively", () => {
    expect(tokens.lookup("base", BASE_USDC.toUpperCase().replace("0X", "0x"))).toMatchObject({
      symbol: "USDC",
      decimals: 6,
      stablecoin: true,
    });
    expect(tokens.lookup("arbitrum", BASE_USDC)).toBeUndefined();
  });
});

describe("TradeValuator", () => {
  it("lets an explicit USD amount raise a derived value", async () => {
    expect(await valuator().value({ network: "base", inputToken: BASE_USDC, amount: "1", amountUsd: 12 })).toEqual({
      valueUsd: 12,
      source: "explicit",
    });
  });

  it("ignores an explicit USD amount below the derived value", async () => {
    expect(
      await valuator().value({ network: "base", inputToken: BASE_USDC, amount: "5000000000", amountUsd: 1 })
    ).toEqual({ valueUsd: 5000, source: "stablecoin" });

    const priced = await valuator(new StaticPriceSource({ WETH: 2000 })).value({
      network: "ethereum",
      inputToken: ETH_WETH,
      amount: "1000000000000000000",
      amountUsd: 5,
    });
    expect(priced).toEqual({ valueUsd: 2000, source: "price-source" });
  });

  it("falls back to an explicit USD amount when nothing can be derived", async () => {
    const result = await valuator().value({
      network: "base",
      inputToken: "0x1111111111111111111111111111111111111111",
      amount: "1",
      amountUsd: 40,
    });
    expect(result).toEqual({ valueUsd: 40, source: "explicit" });
  });

  it("values known stablecoins one to one", async () => {
    expect(await valuator().value({ network: "base", inputToken: BASE_USDC, amount: "2500000" })).toEqual({
      valueUsd: 2.5,
      source: "stablecoin",
    });
  });

  it("prices other tokens through the price source", async () => {
    const result = await valuator(new StaticPriceSource({ WETH: 2000 })).value({
      network: "ethereum",
      inputToken: ETH_WETH,
      amount: "1500000000000000000",
    });
    expect(result).toEqual({ valueUsd: 3000, source: "price-source" });
  });

  it("leaves unknown tokens unpriced", async () => {
    const result = await valuator().value({
      network: "base",
      inputToken: "0x1111111111111111111111111111111111111111",
      amount: "1",
    });
    expect(result).toEqual({ valueUsd: undefined, source: "unpriced", reason: "unknown input token" });
  });

  it("leaves a token without a price unpriced", async () => {
    const result = await valuator(new StaticPriceSource({})).value({ network: "ethereum", inputToken: ETH_WETH, amount: "1" });
    expect(result).toEqual({ valueUsd: undefined, source: "unpriced", reason: "no price for WETH" });
  });

  it("gives up on a slow price source and aborts the lookup", async () => {
    let aborted = false;
    const slow: PriceSource = {
      priceUsd: (_token, signal) =>
        new Promise((resolve) => {
          signal.addEventListener("abort", () => {
            aborted = true;
            resolve(undefined);
          });
        }),
    };

    const result = await valuator(slow, 20).value({ network: "ethereum", inputToken: ETH_WETH, amount: "1" });
    expect(result).toEqual({ valueUsd: undefined, source: "unpriced", reason: "price lookup timed out" });
    expect(aborted).toBe(true);
  });

  it("treats a failing price source as unpriced", async () => {
    const broken: PriceSource = {
      priceUsd: async () => {
        throw new Error("503 from oracle");
      },
    };
    const result = await valuator(broken).value({ network: "ethereum", inputToken: ETH_WETH, amount: "1" });
    expect(result).toEqual({ valueUsd: undefined, source: "unpriced", reason: "price lookup failed" });
  });
});
