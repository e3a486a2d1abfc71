import { LimitExceeded } from "../errors.js";
import type { Logger } from "../logger.js";
import { Mutex } from "../utils/mutex.js";
import { ALLOW, block, type Interceptor, type InterceptorDecision, type ToolCallContext } from "./types.js";

export type CooldownScope = "global" | "per-symbol";

export type CooldownConfig = {
  cooldownSeconds: number;
  scope: CooldownScope;
};

const GLOBAL_KEY = "*";

/**
 * Minimum spacing between successful capital-committing calls. A call that
 * passes holds the key until it is recorded or released, so two concurrent
 * commits cannot both slip in under the same cooldown window.
 */
export class CooldownGate implements Interceptor {
  readonly name = "cooldown" as const;
  private readonly lastCommitAt = new Map<string, number>();
  private readonly inFlight = new Map<string, string>(); // key -> callId
  private readonly lock = new Mutex();

  constructor(
    private readonly cfg: CooldownConfig,
    private readonly log: Logger,
    private readonly now: () => number = Date.now
  ) {}

  private keyFor(ctx: ToolCallContext): string {
    if (this.cfg.scope === "global") return GLOBAL_KEY;
    return ctx.symbol?.toLowerCase() ?? GLOBAL_KEY;
  }

  private get cooldownMs(): number {
    return this.cfg.cooldownSeconds * 1000;
  }

  async decide(ctx: ToolCallContext): Promise<InterceptorDecision> {
    if (ctx.actionKind !== "commit" || this.cooldownMs <= 0) return ALLOW;
    const key = this.keyFor(ctx);

    return this.lock.runExclusive(() => {
      const last = this.lastCommitAt.get(key);
      const elapsed = last === undefined ? Infinity : this.now() - last;

      if (elapsed < this.cooldownMs) {
        const remaining = Math.ceil((this.cooldownMs - elapsed) / 1000);
        return block(
          new LimitExceeded({
            limit: "cooldown",
            message: `Trading cooldown active. Please wait ${remaining} more seconds.`,
            observed: Math.floor(elapsed / 1000),
            ceiling: this.cfg.cooldownSeconds,
          })
        );
      }

      const holder = this.inFlight.get(key);
      if (holder !== undefined && holder !== ctx.callId) {
        return block(
          new LimitExceeded({
            limit: "cooldown-in-flight",
            message: `Another capital-committing call is in flight for ${key === GLOBAL_KEY ? "this wallet" : key}`,
          })
        );
      }

      this.inFlight.set(key, ctx.callId);
      return ALLOW;
    });
  }

  async record(ctx: ToolCallContext): Promise<void> {
    if (ctx.actionKind !== "commit" || this.cooldownMs <= 0) return;
    const key = this.keyFor(ctx);
    await this.lock.runExclusive(() => {
      this.lastCommitAt.set(key, this.now());
      if (this.inFlight.get(key) === ctx.callId) this.inFlight.delete(key);
    });
    this.log.info({ callId: ctx.callId, key }, "cooldown started");
  }

  async release(ctx: ToolCallContext): Promise<void> {
    if (ctx.actionKind !== "commit") return;
    const key = this.keyFor(ctx);
    await this.lock.runExclusive(() => {
      if (this.inFlight.get(key) === ctx.callId) this.inFlight.delete(key);
    });
  }

  lastSuccessAt(symbol?: string): number | undefined {
    const key = this.cfg.scope === "global" ? GLOBAL_KEY : symbol?.toLowerCase() ?? GLOBAL_KEY;
    return this.lastCommitAt.get(key);
  }
}
