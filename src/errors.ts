// src/errors.ts

export type ErrorKind =
  | "AuthenticationFailure"
  | "SchemaViolation"
  | "PolicyDenied"
  | "LimitExceeded"
  | "ExecutionError"
  | "FatalConfiguration";

/** What the script (or an HTTP caller) sees for any block or error. */
export type ErrorPayload = {
  kind: ErrorKind;
  message: string;
  details: Record<string, unknown>;
};

export abstract class GatewayError extends Error {
  abstract readonly kind: ErrorKind;
  readonly details: Record<string, unknown>;

  constructor(message: string, details: Record<string, unknown> = {}) {
    super(message);
    this.name = new.target.name;
    this.details = details;
  }

  toPayload(): ErrorPayload {
    return { kind: this.kind, message: this.message, details: { ...this.details } };
  }
}

/** Bad, expired or missing invocation token. Never reaches the pipeline. */
export class AuthenticationFailure extends GatewayError {
  readonly kind = "AuthenticationFailure" as const;
}

export type SchemaIssue = { path: string; message: string };

export class SchemaViolation extends GatewayError {
  readonly kind = "SchemaViolation" as const;
  readonly issues: readonly SchemaIssue[];

  constructor(toolName: string, issues: SchemaIssue[]) {
    const first = issues[0];
    const summary = first ? `${first.path || "args"}: ${first.message}` : "invalid arguments";
    super(`Invalid arguments for ${toolName}: ${summary}`, { tool: toolName, issues });
    this.issues = issues;
  }
}

export class PolicyDenied extends GatewayError {
  readonly kind = "PolicyDenied" as const;
  readonly ruleId: string;
  readonly reason: string;

  constructor(params: { tool: string; ruleId: string; reason: string }) {
    super(`Policy denied tool ${params.tool}: ${params.reason} (rule_id=${params.ruleId})`, {
      tool: params.tool,
      ruleId: params.ruleId,
      reason: params.reason,
    });
    this.ruleId = params.ruleId;
    this.reason = params.reason;
  }
}

export type LimitName =
  | "per-trade"
  | "daily"
  | "unpriced"
  | "slippage"
  | "price-impact"
  | "cooldown"
  | "cooldown-in-flight";

export class LimitExceeded extends GatewayError {
  readonly kind = "LimitExceeded" as const;
  readonly limit: LimitName;
  readonly observed: number | null;
  readonly ceiling: number | null;

  constructor(params: { limit: LimitName; message: string; observed?: number; ceiling?: number }) {
    super(params.message, {
      limit: params.limit,
      observed: params.observed ?? null,
      ceiling: params.ceiling ?? null,
    });
    this.limit = params.limit;
    this.observed = params.observed ?? null;
    this.ceiling = params.ceiling ?? null;
  }
}

/** Underlying tool or collaborator failure. Never mutates tracker state. */
export class ExecutionError extends GatewayError {
  readonly kind = "ExecutionError" as const;
}

/** Startup-only: the process must refuse to serve calls. */
export class FatalConfiguration extends GatewayError {
  readonly kind = "FatalConfiguration" as const;
}

export function errorMessage(e: unknown): string {
  if (e instanceof Error) {
    // viem errors carry a shorter human message
    const short = "shortMessage" in e && typeof e.shortMessage === "string" ? e.shortMessage : undefined;
    return short ?? e.message;
  }
  return String(e);
}

export function toExecutionError(e: unknown): ExecutionError {
  if (e instanceof ExecutionError) return e;
  return new ExecutionError(errorMessage(e));
}
