import fs from "node:fs";
import { z } from "zod";
import { FatalConfiguration, PolicyDenied } from "../errors.js";
import type { Logger } from "../logger.js";
import { deepFreeze } from "../utils/freeze.js";
import { ALLOW, block, type Interceptor, type InterceptorDecision, type ToolCallContext } from "./types.js";

export type PolicyMode = "default-allow" | "default-deny";

export type PolicyRule = {
  tool: string;
  allowed: boolean;
  rule_id: string;
  reason: string;
};

export type PolicyDocument = {
  mode: PolicyMode;
  rules: readonly PolicyRule[];
};

export const DEFAULT_ALLOW_REASON = "allowed by default policy";
export const DEFAULT_DENY_REASON = "denied by default policy";

const PolicyRuleSchema = z
  .object({
    tool: z.string().min(1),
    allowed: z.boolean(),
    rule_id: z.string().min(1),
    reason: z.string().min(1).default("policy rule"),
  })
  .strict();

const PolicyDocumentSchema = z
  .object({
    mode: z.enum(["default-allow", "default-deny"]),
    rules: z.array(PolicyRuleSchema).default([]),
  })
  .strict();

/**
 * Validates a raw document against the closed tool set. Any problem is fatal:
 * a bad policy never degrades to allow-all.
 */
export function parsePolicyDocument(raw: unknown, knownTools: ReadonlySet<string>): PolicyDocument {
  const parsed = PolicyDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join(".") : "document";
    throw new FatalConfiguration(`Invalid policy document at ${where}: ${issue?.message ?? "unparseable"}`);
  }

  const seen = new Set<string>();
  for (const rule of parsed.data.rules) {
    if (seen.has(rule.tool)) {
      throw new FatalConfiguration(`Duplicate policy rule for tool ${rule.tool}`, { tool: rule.tool });
    }
    if (!knownTools.has(rule.tool)) {
      throw new FatalConfiguration(`Policy rule names unknown tool ${rule.tool}`, { tool: rule.tool });
    }
    seen.add(rule.tool);
  }

  return deepFreeze({ mode: parsed.data.mode, rules: parsed.data.rules });
}

export function loadPolicyDocument(filePath: string, knownTools: ReadonlySet<string>): PolicyDocument {
  let raw: unknown;
  try {
    raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    const detail = e instanceof SyntaxError ? "not valid JSON" : "cannot be read";
    throw new FatalConfiguration(`Policy document ${filePath} ${detail}`, { path: filePath });
  }
  return parsePolicyDocument(raw, knownTools);
}

export type PolicyVerdict =
  | { allowed: true; ruleId?: string; reason: string }
  | { allowed: false; ruleId: string; reason: string };

/** Pure decision over one loaded document. */
export function decidePolicy(
  doc: PolicyDocument,
  toolName: string,
  registeredTools: ReadonlySet<string>
): PolicyVerdict {
  if (!registeredTools.has(toolName)) {
    return { allowed: false, ruleId: "unknown-tool", reason: `unknown tool ${toolName}` };
  }

  const rule = doc.rules.find((r) => r.tool === toolName);
  if (rule) {
    return rule.allowed
      ? { allowed: true, ruleId: rule.rule_id, reason: rule.reason }
      : { allowed: false, ruleId: rule.rule_id, reason: rule.reason };
  }

  if (doc.mode === "default-deny") {
    return { allowed: false, ruleId: "default-deny", reason: DEFAULT_DENY_REASON };
  }
  return { allowed: true, reason: DEFAULT_ALLOW_REASON };
}

/**
 * Holds the live document. Readers take a reference; reload validates the
 * whole replacement before swapping it in.
 */
export class PolicyStore {
  private doc: PolicyDocument;

  constructor(
    initial: PolicyDocument,
    private readonly knownTools: ReadonlySet<string>,
    private readonly filePath?: string
  ) {
    this.doc = initial;
  }

  static fromFile(filePath: string, knownTools: ReadonlySet<string>): PolicyStore {
    return new PolicyStore(loadPolicyDocument(filePath, knownTools), knownTools, filePath);
  }

  current(): PolicyDocument {
    return this.doc;
  }

  /** Throws FatalConfiguration and keeps the previous document on failure. */
  reload(filePath = this.filePath): PolicyDocument {
    if (!filePath) throw new FatalConfiguration("Policy store has no file to reload from");
    const next = loadPolicyDocument(filePath, this.knownTools);
    this.doc = next;
    return next;
  }
}

export class PolicyInterceptor implements Interceptor {
  readonly name = "policy" as const;

  constructor(
    private readonly store: PolicyStore,
    private readonly registeredTools: ReadonlySet<string>,
    private readonly log: Logger
  ) {}

  async decide(ctx: ToolCallContext): Promise<InterceptorDecision> {
    const verdict = decidePolicy(this.store.current(), ctx.toolName, this.registeredTools);
    if (verdict.allowed) return ALLOW;

    this.log.info({ callId: ctx.callId, tool: ctx.toolName, ruleId: verdict.ruleId }, "policy block");
    return block(new PolicyDenied({ tool: ctx.toolName, ruleId: verdict.ruleId, reason: verdict.reason }));
  }
}
