import { formatUnits, parseUnits } from "viem";
import { ExecutionError } from "../errors.js";
import type { TokenInfo, TokenTable } from "../pricing/tokens.js";
import type { PreparedSwap, SwapClient, SwapQuote, SwapRequest } from "../tools/swap.js";
import type { PaperPortfolio } from "./paper-portfolio.js";

export type PaperSwapOptions = {
  pricesUsd: Readonly<Record<string, number>>;
  // Flat impact reported for every paper quote.
  priceImpactPercent?: number;
};

function getUsdPrice(pricesUsd: Readonly<Record<string, number>>, symbol: string): number | null {
  const px = pricesUsd[symbol];
  return typeof px === "number" && isFinite(px) && px > 0 ? px : null;
}

/**
 * Simulated swap backend.
 * - No chain interaction
 * - Deterministic prices from configuration
 * - Every prepared swap lands in the paper portfolio as a FILL or REJECT
 */
export class PaperSwapClient implements SwapClient {
  constructor(
    private readonly tokens: TokenTable,
    private readonly portfolio: PaperPortfolio,
    private readonly opts: PaperSwapOptions
  ) {}

  private resolve(req: SwapRequest): { input: TokenInfo; output: TokenInfo; inPx: number; outPx: number } | string {
    const input = this.tokens.lookup(req.network, req.inputToken);
    const output = this.tokens.lookup(req.network, req.outputToken);
    if (!input || !output) return "unknown token";

    const inPx = getUsdPrice(this.opts.pricesUsd, input.symbol);
    const outPx = getUsdPrice(this.opts.pricesUsd, output.symbol);
    if (inPx === null || outPx === null) return "missing price";
    return { input, output, inPx, outPx };
  }

  async quote(req: SwapRequest, signal: AbortSignal): Promise<SwapQuote> {
    if (signal.aborted) throw new ExecutionError("paper quote cancelled");

    const r = this.resolve(req);
    if (typeof r === "string") throw new ExecutionError(`paper quote failed: ${r}`, { network: req.network });

    const amountIn = Number(formatUnits(BigInt(req.amount), r.input.decimals));
    const amountOut = (amountIn * r.inPx) / r.outPx;
    return {
      network: req.network,
      inputToken: req.inputToken,
      outputToken: req.outputToken,
      inputAmount: req.amount,
      outputAmount: amountOut.toFixed(Math.min(r.output.decimals, 8)),
      priceImpactPercent: this.opts.priceImpactPercent ?? 0,
    };
  }

  async prepareSwap(req: SwapRequest, signal: AbortSignal): Promise<PreparedSwap> {
    if (signal.aborted) throw new ExecutionError("paper swap cancelled");

    const r = this.resolve(req);
    if (typeof r === "string") {
      this.portfolio.reject(req.network, r);
      throw new ExecutionError(`paper swap rejected: ${r}`);
    }

    const quote = await this.quote(req, signal);
    // An abandoned call must not leave a fill behind.
    if (signal.aborted) throw new ExecutionError("paper swap cancelled");

    const fill = this.portfolio.fill({
      network: req.network,
      input: r.input,
      output: r.output,
      amountIn: BigInt(req.amount),
      amountOut: parseUnits(quote.outputAmount, r.output.decimals),
      inputPriceUsd: r.inPx,
      outputPriceUsd: r.outPx,
    });

    return {
      ...quote,
      status: "paper_filled",
      reference: fill.fillId,
      note: "Simulated fill. Nothing was signed or broadcast.",
    };
  }
}
