import { LimitExceeded } from "../errors.js";
import type { Logger } from "../logger.js";
import { Mutex } from "../utils/mutex.js";
import { utcDayKey, type DailySpending, type SpendLedger } from "./spend-ledger.js";
import { ALLOW, block, type Interceptor, type InterceptorDecision, type ToolCallContext } from "./types.js";

export type UnpricedTradePolicy = "fail-open" | "fail-closed";

export type SpendLimitConfig = {
  maxPerTradeUsd: number;
  maxDailyUsd: number;
  // No default on purpose: the operator must pick one.
  unpricedTradePolicy: UnpricedTradePolicy;
};

const usd = (n: number) => `$${n.toFixed(2)}`;

/**
 * Daily and per-trade caps for capital-committing calls.
 *
 * `decide` reserves the trade value under the call id inside one critical
 * section; `record` confirms it after a successful call and `release` drops
 * it otherwise. Concurrent calls therefore see each other's pending value and
 * can never be admitted jointly past the daily cap.
 */
export class SpendLimitTracker implements Interceptor {
  readonly name = "spend-limit" as const;
  private readonly lock = new Mutex();

  constructor(
    private readonly cfg: SpendLimitConfig,
    private readonly ledger: SpendLedger,
    private readonly log: Logger,
    private readonly now: () => number = Date.now
  ) {
    if (!(cfg.maxPerTradeUsd > 0) || !(cfg.maxDailyUsd > 0)) {
      throw new RangeError("spend limits must be positive");
    }
  }

  async decide(ctx: ToolCallContext): Promise<InterceptorDecision> {
    if (ctx.actionKind !== "commit") return ALLOW;

    const value = ctx.tradeValueUsd;
    if (value === undefined) return this.decideUnpriced(ctx);

    const result = await this.lock.runExclusive(() =>
      this.ledger.reserve({
        callId: ctx.callId,
        amountUsd: value,
        day: utcDayKey(this.now()),
        now: this.now(),
        maxPerTradeUsd: this.cfg.maxPerTradeUsd,
        maxDailyUsd: this.cfg.maxDailyUsd,
      })
    );

    if (result.ok) {
      this.log.info({ callId: ctx.callId, amountUsd: value, pendingUsd: result.pendingUsd }, "spend reserved");
      return ALLOW;
    }

    if (result.limit === "per-trade") {
      return block(
        new LimitExceeded({
          limit: "per-trade",
          message: `Trade value ${usd(result.amountUsd)} exceeds per-trade limit of ${usd(result.maxPerTradeUsd)}`,
          observed: result.amountUsd,
          ceiling: result.maxPerTradeUsd,
        })
      );
    }

    const committed = result.totalUsd + result.pendingUsd;
    return block(
      new LimitExceeded({
        limit: "daily",
        message:
          `Trade would exceed daily limit. Current: ${usd(committed)}, ` +
          `This trade: ${usd(result.amountUsd)}, Limit: ${usd(result.maxDailyUsd)}`,
        observed: committed + result.amountUsd,
        ceiling: result.maxDailyUsd,
      })
    );
  }

  private decideUnpriced(ctx: ToolCallContext): InterceptorDecision {
    if (this.cfg.unpricedTradePolicy === "fail-open") {
      this.log.warn({ callId: ctx.callId, tool: ctx.toolName }, "unpriced trade admitted (fail-open)");
      return ALLOW;
    }
    return block(
      new LimitExceeded({
        limit: "unpriced",
        message: "Trade value could not be determined; unpriced trades are blocked. Pass amount_usd explicitly.",
      })
    );
  }

  async record(ctx: ToolCallContext): Promise<void> {
    if (ctx.actionKind !== "commit" || ctx.tradeValueUsd === undefined) return;

    const result = await this.lock.runExclusive(() => this.ledger.confirm(ctx.callId, this.now()));
    if (result.state === "confirmed") {
      this.log.info({ callId: ctx.callId, day: result.day, totalUsd: result.totalUsd }, "spend recorded");
    } else if (result.state === "stale-day") {
      this.log.warn({ callId: ctx.callId, day: result.day }, "spend confirmed after its UTC day closed");
    } else {
      this.log.error({ callId: ctx.callId }, "spend confirm without reservation");
    }
  }

  async release(ctx: ToolCallContext): Promise<void> {
    if (ctx.actionKind !== "commit") return;
    const dropped = await this.lock.runExclusive(() => this.ledger.release(ctx.callId));
    if (dropped) this.log.info({ callId: ctx.callId }, "spend reservation released");
  }

  snapshot(): DailySpending {
    return this.ledger.snapshot(utcDayKey(this.now()));
  }
}
