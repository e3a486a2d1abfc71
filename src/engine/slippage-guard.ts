import { LimitExceeded } from "../errors.js";
import { ALLOW, block, type Interceptor, type InterceptorDecision, type ToolCallContext } from "./types.js";

export type SlippageGuardConfig = {
  maxSlippagePercent: number;
  maxPriceImpactPercent: number;
};

/** Stateless ceiling on requested slippage tolerance and reported price impact. */
export class SlippageGuard implements Interceptor {
  readonly name = "slippage" as const;

  constructor(private readonly cfg: SlippageGuardConfig) {}

  async decide(ctx: ToolCallContext): Promise<InterceptorDecision> {
    if (ctx.actionKind !== "commit") return ALLOW;

    const requested = ctx.slippagePercent;
    if (requested !== undefined && requested > this.cfg.maxSlippagePercent) {
      return block(
        new LimitExceeded({
          limit: "slippage",
          message: `Requested slippage ${requested}% exceeds maximum allowed ${this.cfg.maxSlippagePercent}%`,
          observed: requested,
          ceiling: this.cfg.maxSlippagePercent,
        })
      );
    }

    const impact = ctx.priceImpactPercent;
    if (impact !== undefined && Math.abs(impact) > this.cfg.maxPriceImpactPercent) {
      return block(
        new LimitExceeded({
          limit: "price-impact",
          message: `Reported price impact ${impact}% exceeds maximum allowed ${this.cfg.maxPriceImpactPercent}%`,
          observed: impact,
          ceiling: this.cfg.maxPriceImpactPercent,
        })
      );
    }

    return ALLOW;
  }
}
