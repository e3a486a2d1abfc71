import type { z } from "zod";
import type { SchemaIssue } from "../errors.js";
import type { ActionKind } from "../engine/types.js";
import type { ToolSession } from "./session.js";

/** The closed tool set. Policy documents may only name these. */
export const TOOL_NAMES = [
  "wallet_derive_address",
  "wallet_sign_message",
  "wallet_sign_tx",
  "wallet_balances",
  "swap",
  "query_pools",
  "paper_portfolio",
] as const;

export type ToolName = (typeof TOOL_NAMES)[number];

export const KNOWN_TOOL_NAMES: ReadonlySet<string> = new Set<string>(TOOL_NAMES);

export function isToolName(name: string): name is ToolName {
  return KNOWN_TOOL_NAMES.has(name);
}

/** Governance-relevant facts about one call, derived from its validated args. */
export type CallAnnotation = {
  actionKind: ActionKind;
  network: string;
  tradeValueUsd?: number;
  priceImpactPercent?: number;
  slippagePercent?: number;
  symbol?: string;
};

export type ToolArgs = Record<string, unknown>;

/** Validated args with the typed behaviour bound to them. */
export interface PreparedCall {
  readonly args: Readonly<ToolArgs>;
  annotate(signal: AbortSignal): Promise<CallAnnotation>;
  open(signal: AbortSignal): ToolSession;
}

export type PrepareResult = { ok: true; call: PreparedCall } | { ok: false; issues: SchemaIssue[] };

export interface RegisteredTool {
  readonly name: ToolName;
  readonly description: string;
  readonly sensitiveArgs: readonly string[];
  prepare(raw: unknown): PrepareResult;
}

export type ToolSpec<A extends ToolArgs> = {
  name: ToolName;
  description: string;
  schema: z.ZodType<A, z.ZodTypeDef, unknown>;
  /** Args replaced by "[REDACTED]" in audit records. */
  sensitiveArgs?: readonly string[];
  annotate(args: A, signal: AbortSignal): CallAnnotation | Promise<CallAnnotation>;
  open(args: A, signal: AbortSignal): ToolSession;
};

export function defineTool<A extends ToolArgs>(spec: ToolSpec<A>): RegisteredTool {
  return Object.freeze({
    name: spec.name,
    description: spec.description,
    sensitiveArgs: Object.freeze([...(spec.sensitiveArgs ?? [])]),
    prepare(raw: unknown): PrepareResult {
      const parsed = spec.schema.safeParse(raw);
      if (!parsed.success) {
        return {
          ok: false,
          issues: parsed.error.issues.map((i) => ({ path: i.path.join("."), message: i.message })),
        };
      }
      const args = parsed.data;
      return {
        ok: true,
        call: {
          args,
          annotate: async (signal) => spec.annotate(args, signal),
          open: (signal) => spec.open(args, signal),
        },
      };
    },
  });
}
