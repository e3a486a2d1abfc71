import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { appendFileSync, mkdtempSync, rmSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { FatalConfiguration } from "../../src/errors.js";
import { silentLogger } from "../../src/logger.js";
import { PaperLedger } from "../../src/paper/paper-ledger.js";
import { PaperPortfolio, type FillRequest } from "../../src/paper/paper-portfolio.js";
import { TokenTable } from "../../src/pricing/tokens.js";
import { BASE_USDC, BASE_WETH } from "../helpers/fixtures.js";

const tokens = TokenTable.load();
const pricesUsd = { USDC: 1, WETH: 2000 };

function usdcToWeth(usdc: bigint, weth: bigint): FillRequest {
  const input = tokens.lookup("base", BASE_USDC);
  const output = tokens.lookup("base", BASE_WETH);
  if (!input || !output) throw new Error("token table is missing base USDC/WETH");
  return { network: "base", input, output, amountIn: usdc, amountOut: weth, inputPriceUsd: 1, outputPriceUsd: 2000 };
}

describe("PaperPortfolio", () => {
  let dir: string;
  let ledgerPath: string;

  const open = (initialBalances: Record<string, string> = { USDC: "10000" }, prices: Record<string, number> = pricesUsd) =>
    PaperPortfolio.open(
      tokens,
      new PaperLedger(ledgerPath),
      { network: "base", initialBalances, pricesUsd: prices, now: () => Date.parse("2026-03-10T12:00:00Z") },
      silentLogger()
    );

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "paper-portfolio-"));
    ledgerPath = join(dir, "fills.jsonl");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("credits the starting balances on the paper network", () => {
    const portfolio = open();
    expect(portfolio.initialBalanceUsd).toBe(10000);
    expect(portfolio.balances()).toEqual([
      {
        network: "base",
        token: BASE_USDC,
        symbol: "USDC",
        decimals: 6,
        balanceRaw: "10000000000",
        balance: "10000",
        valueUsd: 10000,
      },
    ]);
  });

  it("refuses a starting balance for a token it does not know", () => {
    expect(() => open({ DOGE: "5" })).toThrow(FatalConfiguration);
    expect(() => open({ DOGE: "5" })).toThrow("paper balance names DOGE, which is not a known token on base");
  });

  it("refuses a starting balance that is not a decimal amount", () => {
    expect(() => open({ USDC: "lots" })).toThrow("paper balance for USDC is not a decimal amount (got: lots)");
  });

  it("moves balances on a fill", () => {
    const portfolio = open();
    const fill = portfolio.fill(usdcToWeth(1_000_000_000n, 500_000_000_000_000_000n));

    expect(fill.valueUsd).toBe(1000);
    expect(portfolio.balanceOf("base", BASE_USDC)).toBe(9_000_000_000n);
    expect(portfolio.balanceOf("base", BASE_WETH)).toBe(500_000_000_000_000_000n);
    expect(portfolio.balances("ethereum")).toEqual([]);
  });

  it("drops a holding that is spent down to zero", () => {
    const portfolio = open({ USDC: "1000" });
    portfolio.fill(usdcToWeth(1_000_000_000n, 500_000_000_000_000_000n));
    expect(portfolio.balances().map((b) => b.symbol)).toEqual(["WETH"]);
  });

  it("replays the ledger on reopen", () => {
    const first = open();
    first.fill(usdcToWeth(1_000_000_000n, 500_000_000_000_000_000n));
    first.fill(usdcToWeth(2_000_000_000n, 1_000_000_000_000_000_000n));

    const reopened = open();
    expect(reopened.balanceOf("base", BASE_USDC)).toBe(7_000_000_000n);
    expect(reopened.balanceOf("base", BASE_WETH)).toBe(1_500_000_000_000_000_000n);
    expect(reopened.trades(10).map((f) => f.valueUsd)).toEqual([1000, 2000]);
  });

  it("ignores rejects and torn lines when replaying", () => {
    const first = open();
    first.reject("base", "unknown token");
    first.fill(usdcToWeth(1_000_000_000n, 500_000_000_000_000_000n));
    appendFileSync(ledgerPath, '{"kind":"FILL","ts":', "utf8");

    const reopened = open();
    expect(reopened.trades(10)).toHaveLength(1);
    expect(reopened.balanceOf("base", BASE_USDC)).toBe(9_000_000_000n);
  });

  it("reports profit and loss against the starting value", () => {
    const portfolio = open({ USDC: "1000" }, pricesUsd);
    // 1000 USDC buys 0.5 WETH at 2000
    portfolio.fill(usdcToWeth(1_000_000_000n, 500_000_000_000_000_000n));

    const repriced = open({ USDC: "1000" }, { USDC: 1, WETH: 2200 });
    expect(repriced.metrics()).toEqual({
      initialBalanceUsd: 1000,
      currentValueUsd: 1100,
      totalPnlUsd: 100,
      totalPnlPercent: 10,
      totalTrades: 1,
      totalVolumeUsd: 1000,
      unpricedSymbols: [],
    });
  });

  it("lists held tokens it cannot price", () => {
    const portfolio = open({ USDC: "1000" }, pricesUsd);
    portfolio.fill(usdcToWeth(1_000_000_000n, 500_000_000_000_000_000n));

    const metrics = open({ USDC: "1000" }, { USDC: 1 }).metrics();
    expect(metrics.currentValueUsd).toBe(0);
    expect(metrics.unpricedSymbols).toEqual(["WETH"]);
  });

  it("keeps the most recent trades when limited", () => {
    const portfolio = open();
    for (let i = 1; i <= 3; i++) portfolio.fill(usdcToWeth(BigInt(i) * 1_000_000n, 1n));
    expect(portfolio.trades(2).map((f) => f.amountIn)).toEqual(["2000000", "3000000"]);
  });
});
