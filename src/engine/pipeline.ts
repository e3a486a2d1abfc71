import { PolicyDenied, toExecutionError, type ExecutionError, type SchemaViolation } from "../errors.js";
import type { Logger } from "../logger.js";
import { raceDeadline } from "../utils/deadline.js";
import type { AuditContext, AuditRecord, AuditSink } from "./audit.js";
import {
  block,
  type BlockDecision,
  type CallOutcome,
  type Interceptor,
  type InterceptorDecision,
  type StageName,
  type ToolCallContext,
} from "./types.js";

export type GovernanceStages = {
  policy: Interceptor;
  spendLimit: Interceptor;
  slippage: Interceptor;
  cooldown: Interceptor;
};

export type PipelineOptions = {
  audit: AuditSink;
  log: Logger;
  stageTimeoutMs: number;
  now?: () => number;
};

export type PipelineResult =
  | { status: "blocked"; stage: StageName; decision: BlockDecision }
  | CallOutcome;

export type Execute = () => Promise<CallOutcome>;

/**
 * Policy -> Spend Limit -> Slippage Guard -> Cooldown, fixed at construction.
 *
 * The first block stops evaluation and releases whatever earlier stages held.
 * The audit record is written in `finally`, whatever the exit path.
 */
export class GovernancePipeline {
  private readonly stages: readonly Interceptor[];
  private readonly now: () => number;

  constructor(
    stages: GovernanceStages,
    private readonly opts: PipelineOptions
  ) {
    this.stages = Object.freeze([stages.policy, stages.spendLimit, stages.slippage, stages.cooldown]);
    this.now = opts.now ?? Date.now;
  }

  get order(): readonly StageName[] {
    return this.stages.map((s) => s.name);
  }

  async run(ctx: ToolCallContext, auditContext: AuditContext, execute: Execute): Promise<PipelineResult> {
    const startedAt = this.now();
    const passed: Interceptor[] = [];
    let result: PipelineResult | undefined;

    try {
      for (const stage of this.stages) {
        const decision = await this.decideBounded(stage, ctx);
        if (decision.type === "block") {
          await this.releaseAll(passed, ctx);
          result = { status: "blocked", stage: stage.name, decision };
          return result;
        }
        passed.push(stage);
      }

      let outcome: CallOutcome;
      try {
        outcome = await execute();
      } catch (e) {
        outcome = { status: "error", error: toExecutionError(e) };
      }

      if (outcome.status === "done") await this.recordAll(passed, ctx, outcome);
      else await this.releaseAll(passed, ctx);

      result = outcome;
      return outcome;
    } finally {
      this.writeAudit(this.toRecord(ctx, auditContext, result, startedAt));
    }
  }

  /**
   * Audit entry for a call that never reached the stages: rejected by argument
   * validation, or failed while its governance facts were being gathered.
   */
  recordRejection(
    ctx: ToolCallContext,
    auditContext: AuditContext,
    stage: "schema" | "annotate",
    error: SchemaViolation | ExecutionError
  ): void {
    this.writeAudit({
      ts: new Date(ctx.requestedAt).toISOString(),
      callId: ctx.callId,
      tool: ctx.toolName,
      decision: error.kind === "SchemaViolation" ? "block" : "error",
      stage,
      reason: error.message,
      errorKind: error.kind,
      durationMs: this.now() - ctx.requestedAt,
      context: auditContext,
    });
  }

  private async decideBounded(stage: Interceptor, ctx: ToolCallContext): Promise<InterceptorDecision> {
    const pending = stage.decide(ctx);
    try {
      const raced = await raceDeadline(pending, { timeoutMs: this.opts.stageTimeoutMs });
      if (raced.kind === "value") return raced.value;
    } catch (e) {
      this.opts.log.error({ callId: ctx.callId, stage: stage.name, err: toExecutionError(e).message }, "stage failed");
      return this.failClosed(stage, ctx, `${stage.name} stage failed`);
    }

    // A late allow may still reserve state; give it back once it lands.
    void pending
      .then((late) => (late.type === "allow" ? stage.release?.(ctx) : undefined))
      .catch((e: unknown) =>
        this.opts.log.error({ callId: ctx.callId, stage: stage.name, err: toExecutionError(e).message }, "late release failed")
      );

    this.opts.log.warn({ callId: ctx.callId, stage: stage.name, timeoutMs: this.opts.stageTimeoutMs }, "stage timed out");
    return this.failClosed(stage, ctx, `${stage.name} stage timed out after ${this.opts.stageTimeoutMs}ms`);
  }

  private failClosed(stage: Interceptor, ctx: ToolCallContext, reason: string): BlockDecision {
    return block(new PolicyDenied({ tool: ctx.toolName, ruleId: `${stage.name}-unavailable`, reason }));
  }

  private async releaseAll(stages: readonly Interceptor[], ctx: ToolCallContext): Promise<void> {
    for (const stage of stages) {
      if (!stage.release) continue;
      try {
        await stage.release(ctx);
      } catch (e) {
        this.opts.log.error({ callId: ctx.callId, stage: stage.name, err: toExecutionError(e).message }, "release failed");
      }
    }
  }

  private async recordAll(
    stages: readonly Interceptor[],
    ctx: ToolCallContext,
    outcome: Extract<CallOutcome, { status: "done" }>
  ): Promise<void> {
    for (const stage of stages) {
      if (!stage.record) continue;
      try {
        await stage.record(ctx, outcome);
      } catch (e) {
        // The call already happened; keep recording the remaining stages.
        this.opts.log.error({ callId: ctx.callId, stage: stage.name, err: toExecutionError(e).message }, "record failed");
      }
    }
  }

  private toRecord(
    ctx: ToolCallContext,
    context: AuditContext,
    result: PipelineResult | undefined,
    startedAt: number
  ): AuditRecord {
    const base = {
      ts: new Date(startedAt).toISOString(),
      callId: ctx.callId,
      tool: ctx.toolName,
      durationMs: this.now() - startedAt,
      context,
    };

    if (!result) return { ...base, decision: "error", reason: "governance pipeline failed" };

    switch (result.status) {
      case "blocked":
        return {
          ...base,
          decision: "block",
          stage: result.stage,
          ruleId: result.decision.ruleId,
          reason: result.decision.reason,
          errorKind: result.decision.error.kind,
        };
      case "done":
        return { ...base, decision: "allow" };
      case "error":
        return { ...base, decision: "error", reason: result.error.message, errorKind: result.error.kind };
      case "abandoned":
        return { ...base, decision: "abandoned", reason: result.reason };
    }
  }

  private writeAudit(record: AuditRecord): void {
    try {
      this.opts.audit.append(record);
    } catch (e) {
      this.opts.log.error({ callId: record.callId, err: toExecutionError(e).message }, "audit append failed");
    }
  }
}
