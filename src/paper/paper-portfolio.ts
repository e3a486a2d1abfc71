import crypto from "node:crypto";
import { formatUnits, parseUnits } from "viem";
import { ExecutionError, FatalConfiguration } from "../errors.js";
import type { Logger } from "../logger.js";
import type { TokenInfo, TokenTable } from "../pricing/tokens.js";
import type { PaperFill, PaperLedger } from "./paper-ledger.js";

export type PaperPortfolioOptions = {
  // Network the starting balances are credited on.
  network: string;
  // symbol -> decimal amount, e.g. { USDC: "10000" }
  initialBalances: Readonly<Record<string, string>>;
  pricesUsd: Readonly<Record<string, number>>;
  now?: () => number;
};

export type PaperBalance = {
  network: string;
  token: string;
  symbol: string;
  decimals: number;
  balanceRaw: string;
  balance: string;
  valueUsd: number | null;
};

export type PaperMetrics = {
  initialBalanceUsd: number;
  currentValueUsd: number;
  totalPnlUsd: number;
  totalPnlPercent: number;
  totalTrades: number;
  totalVolumeUsd: number;
  // Held symbols without a configured price; excluded from currentValueUsd.
  unpricedSymbols: string[];
};

export type FillRequest = {
  network: string;
  input: TokenInfo;
  output: TokenInfo;
  amountIn: bigint;
  amountOut: bigint;
  inputPriceUsd: number;
  outputPriceUsd: number;
};

const holdingKey = (network: string, address: string) => `${network}:${address.toLowerCase()}`;

/**
 * Simulated holdings derived from the paper ledger.
 *
 * On open, the starting balances are credited and every FILL in the ledger is
 * replayed, so balances survive a restart. New fills are checked against the
 * input balance, appended to the ledger and applied in one synchronous step.
 */
export class PaperPortfolio {
  private readonly holdings = new Map<string, { token: TokenInfo; network: string; raw: bigint }>();
  private readonly fills: PaperFill[] = [];
  private readonly now: () => number;
  readonly initialBalanceUsd: number;

  private constructor(
    private readonly tokens: TokenTable,
    private readonly ledger: PaperLedger,
    private readonly opts: PaperPortfolioOptions,
    private readonly log: Logger
  ) {
    this.now = opts.now ?? Date.now;

    let initialUsd = 0;
    for (const [symbol, amount] of Object.entries(opts.initialBalances)) {
      const token = tokens.findBySymbol(opts.network, symbol);
      if (!token) throw new FatalConfiguration(`paper balance names ${symbol}, which is not a known token on ${opts.network}`);

      let raw: bigint;
      try {
        raw = parseUnits(amount, token.decimals);
      } catch {
        throw new FatalConfiguration(`paper balance for ${symbol} is not a decimal amount (got: ${amount})`);
      }
      this.credit(opts.network, token, raw);

      const px = this.priceOf(token.symbol);
      if (px !== null) initialUsd += Number(formatUnits(raw, token.decimals)) * px;
    }
    this.initialBalanceUsd = initialUsd;
  }

  static open(tokens: TokenTable, ledger: PaperLedger, opts: PaperPortfolioOptions, log: Logger): PaperPortfolio {
    const portfolio = new PaperPortfolio(tokens, ledger, opts, log);
    let replayed = 0;
    for (const entry of ledger.readAll()) {
      if (entry.kind !== "FILL") continue;
      portfolio.replay(entry);
      replayed++;
    }
    if (replayed > 0) log.info({ fills: replayed }, "paper portfolio replayed from ledger");
    return portfolio;
  }

  private priceOf(symbol: string): number | null {
    const px = this.opts.pricesUsd[symbol];
    return typeof px === "number" && Number.isFinite(px) && px > 0 ? px : null;
  }

  private credit(network: string, token: TokenInfo, raw: bigint): void {
    const key = holdingKey(network, token.address);
    const cur = this.holdings.get(key)?.raw ?? 0n;
    this.holdings.set(key, { token, network, raw: cur + raw });
  }

  private debit(network: string, token: TokenInfo, raw: bigint): void {
    const key = holdingKey(network, token.address);
    const left = (this.holdings.get(key)?.raw ?? 0n) - raw;
    if (left > 0n) this.holdings.set(key, { token, network, raw: left });
    else this.holdings.delete(key);
  }

  private replay(fill: PaperFill): void {
    const input = this.tokens.lookup(fill.network, fill.inputAddress);
    const output = this.tokens.lookup(fill.network, fill.outputAddress);
    if (!input || !output) {
      this.log.warn({ fillId: fill.fillId }, "paper fill names a token no longer in the table; skipped");
      return;
    }

    const amountIn = BigInt(fill.amountIn);
    if (this.balanceOf(fill.network, input.address) < amountIn) {
      this.log.warn({ fillId: fill.fillId, symbol: input.symbol }, "replayed paper fill overdraws its input; balance floored at zero");
    }
    this.debit(fill.network, input, amountIn);
    this.credit(fill.network, output, BigInt(fill.amountOut));
    this.fills.push(fill);
  }

  balanceOf(network: string, address: string): bigint {
    return this.holdings.get(holdingKey(network, address))?.raw ?? 0n;
  }

  /** Applies a simulated swap, or appends a REJECT and throws when the input balance is short. */
  fill(req: FillRequest): PaperFill {
    const ts = new Date(this.now()).toISOString();
    const fillId = crypto.randomUUID();

    const have = this.balanceOf(req.network, req.input.address);
    if (have < req.amountIn) {
      const note =
        `insufficient ${req.input.symbol} balance: have ${formatUnits(have, req.input.decimals)}, ` +
        `need ${formatUnits(req.amountIn, req.input.decimals)}`;
      this.reject(req.network, note, fillId);
      throw new ExecutionError(`paper swap rejected: ${note}`, { fillId });
    }

    const fill: PaperFill = {
      ts,
      kind: "FILL",
      fillId,
      network: req.network,
      inputToken: req.input.symbol,
      outputToken: req.output.symbol,
      inputAddress: req.input.address,
      outputAddress: req.output.address,
      amountIn: req.amountIn.toString(),
      amountOut: req.amountOut.toString(),
      inputPriceUsd: req.inputPriceUsd,
      outputPriceUsd: req.outputPriceUsd,
      valueUsd: Number(formatUnits(req.amountIn, req.input.decimals)) * req.inputPriceUsd,
      note: "paper fill using configured pricing",
    };

    this.ledger.append(fill);
    this.debit(req.network, req.input, req.amountIn);
    this.credit(req.network, req.output, req.amountOut);
    this.fills.push(fill);
    return fill;
  }

  reject(network: string, note: string, fillId: string = crypto.randomUUID()): void {
    this.ledger.append({ ts: new Date(this.now()).toISOString(), kind: "REJECT", fillId, network, note });
  }

  balances(network?: string): PaperBalance[] {
    const out: PaperBalance[] = [];
    for (const h of this.holdings.values()) {
      if (network && h.network !== network) continue;
      const px = this.priceOf(h.token.symbol);
      const balance = formatUnits(h.raw, h.token.decimals);
      out.push({
        network: h.network,
        token: h.token.address,
        symbol: h.token.symbol,
        decimals: h.token.decimals,
        balanceRaw: h.raw.toString(),
        balance,
        valueUsd: px === null ? null : Number(balance) * px,
      });
    }
    return out;
  }

  /** Most recent fills, oldest first. */
  trades(limit: number): PaperFill[] {
    return this.fills.slice(-limit);
  }

  metrics(): PaperMetrics {
    let currentValueUsd = 0;
    const unpriced = new Set<string>();
    for (const b of this.balances()) {
      if (b.valueUsd === null) unpriced.add(b.symbol);
      else currentValueUsd += b.valueUsd;
    }

    const totalPnlUsd = currentValueUsd - this.initialBalanceUsd;
    return {
      initialBalanceUsd: this.initialBalanceUsd,
      currentValueUsd,
      totalPnlUsd,
      totalPnlPercent: this.initialBalanceUsd > 0 ? (totalPnlUsd / this.initialBalanceUsd) * 100 : 0,
      totalTrades: this.fills.length,
      totalVolumeUsd: this.fills.reduce((sum, f) => sum + f.valueUsd, 0),
      unpricedSymbols: [...unpriced],
    };
  }
}
