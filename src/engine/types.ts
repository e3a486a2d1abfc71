// src/engine/types.ts
import type { ExecutionError, LimitExceeded, PolicyDenied } from "../errors.js";

/**
 * read   = quotes and data queries, never touches spend state
 * sign   = wallet signatures
 * commit = capital-committing (prepared swaps)
 */
export type ActionKind = "read" | "sign" | "commit";

/** Built once per call by the gateway, deep-frozen, shared by every stage. */
export interface ToolCallContext {
  readonly callId: string;
  readonly toolName: string;
  readonly args: Readonly<Record<string, unknown>>;
  readonly actionKind: ActionKind;
  readonly network: string;
  readonly requestedAt: number; // epoch ms
  readonly tradeValueUsd?: number;
  readonly priceImpactPercent?: number;
  readonly slippagePercent?: number;
  readonly symbol?: string;
}

export type AllowDecision = Readonly<{ type: "allow" }>;

export type BlockDecision = Readonly<{
  type: "block";
  reason: string;
  ruleId?: string;
  error: PolicyDenied | LimitExceeded;
}>;

export type InterceptorDecision = AllowDecision | BlockDecision;

export const ALLOW: AllowDecision = Object.freeze({ type: "allow" });

export function block(error: PolicyDenied | LimitExceeded): BlockDecision {
  const ruleId = error.kind === "PolicyDenied" ? error.ruleId : error.limit;
  return Object.freeze({ type: "block", reason: error.message, ruleId, error });
}

export type StageName = "policy" | "spend-limit" | "slippage" | "cooldown";

export type CallOutcome =
  | { status: "done"; output: Record<string, unknown> }
  | { status: "error"; error: ExecutionError }
  | { status: "abandoned"; reason: string };

export interface Interceptor {
  readonly name: StageName;
  decide(ctx: ToolCallContext): Promise<InterceptorDecision>;
  /** Offered only after the call reached `done`. */
  record?(ctx: ToolCallContext, outcome: Extract<CallOutcome, { status: "done" }>): Promise<void>;
  /** Drops anything `decide` held for this call. Idempotent per callId. */
  release?(ctx: ToolCallContext): Promise<void>;
}
