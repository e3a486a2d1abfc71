import { formatUnits } from "viem";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import { raceDeadline } from "../utils/deadline.js";
import type { TokenInfo, TokenTable } from "./tokens.js";

/** Live USD price for a token. Must honour the abort signal. */
export interface PriceSource {
  priceUsd(token: TokenInfo, signal: AbortSignal): Promise<number | undefined>;
}

/** Fixed symbol -> USD map; used for paper trading and tests. */
export class StaticPriceSource implements PriceSource {
  constructor(private readonly pricesUsd: Readonly<Record<string, number>>) {}

  async priceUsd(token: TokenInfo): Promise<number | undefined> {
    const px = this.pricesUsd[token.symbol];
    return typeof px === "number" && Number.isFinite(px) && px > 0 ? px : undefined;
  }
}

export type ValuationRequest = {
  network: string;
  inputToken: string;
  amount: string; // base units
  amountUsd?: number;
};

export type Valuation =
  | { valueUsd: number; source: "explicit" | "stablecoin" | "price-source" }
  | { valueUsd: undefined; source: "unpriced"; reason: string };

/**
 * Trade value in USD derived from the trade itself: a known stablecoin valued
 * 1:1, else a time-bounded price lookup. A script-supplied `amount_usd` can
 * only raise a derived value; it stands alone only when nothing can be
 * derived. Anything else is unpriced and left to the spend tracker's
 * configured policy.
 */
export class TradeValuator {
  constructor(
    private readonly tokens: TokenTable,
    private readonly log: Logger,
    private readonly opts: { priceSource?: PriceSource; lookupTimeoutMs: number }
  ) {}

  async value(req: ValuationRequest, signal?: AbortSignal): Promise<Valuation> {
    const derived = await this.derive(req, signal);
    const claimed = req.amountUsd;
    if (claimed === undefined) return derived;
    if (derived.valueUsd === undefined || claimed > derived.valueUsd) return { valueUsd: claimed, source: "explicit" };
    return derived;
  }

  private async derive(req: ValuationRequest, signal?: AbortSignal): Promise<Valuation> {
    const token = this.tokens.lookup(req.network, req.inputToken);
    if (!token) return { valueUsd: undefined, source: "unpriced", reason: "unknown input token" };

    const units = Number(formatUnits(BigInt(req.amount), token.decimals));
    if (token.stablecoin) return { valueUsd: units, source: "stablecoin" };

    const source = this.opts.priceSource;
    if (!source) return { valueUsd: undefined, source: "unpriced", reason: `no price source for ${token.symbol}` };

    const lookup = new AbortController();
    const onOuterAbort = () => lookup.abort();
    signal?.addEventListener("abort", onOuterAbort, { once: true });
    try {
      const raced = await raceDeadline(source.priceUsd(token, lookup.signal), {
        timeoutMs: this.opts.lookupTimeoutMs,
        signal,
      });
      if (raced.kind !== "value") {
        lookup.abort();
        this.log.warn({ token: token.symbol, outcome: raced.kind }, "price lookup did not complete");
        return { valueUsd: undefined, source: "unpriced", reason: `price lookup ${raced.kind === "timeout" ? "timed out" : "cancelled"}` };
      }
      if (raced.value === undefined) {
        return { valueUsd: undefined, source: "unpriced", reason: `no price for ${token.symbol}` };
      }
      return { valueUsd: units * raced.value, source: "price-source" };
    } catch (e) {
      this.log.warn({ token: token.symbol, err: errorMessage(e) }, "price lookup failed");
      return { valueUsd: undefined, source: "unpriced", reason: "price lookup failed" };
    } finally {
      signal?.removeEventListener("abort", onOuterAbort);
    }
  }
}
