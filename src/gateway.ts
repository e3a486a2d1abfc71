import { randomUUID } from "node:crypto";
import {
  AuthenticationFailure,
  ExecutionError,
  SchemaViolation,
  toExecutionError,
  type ErrorPayload,
} from "./errors.js";
import { redactArgs, type AuditContext } from "./engine/audit.js";
import type { GovernancePipeline, PipelineResult } from "./engine/pipeline.js";
import type { CallOutcome, ToolCallContext } from "./engine/types.js";
import type { Logger } from "./logger.js";
import type { InvocationTokenAuthority } from "./security/invocation-tokens.js";
import type { ToolRegistry, ToolListing } from "./tools/registry.js";
import type { ToolSession } from "./tools/session.js";
import type { CallAnnotation } from "./tools/types.js";
import { abortReason, deadlineController, raceDeadline } from "./utils/deadline.js";
import { deepFreeze } from "./utils/freeze.js";

export type ToolCallRequest = {
  tool_name: string;
  args?: unknown;
  invocation_token?: unknown;
};

/** The script only ever observes a terminal status. */
export type ToolCallResponse =
  | { status: "done"; output: Record<string, unknown> }
  | { status: "error"; error: ErrorPayload };

export type GatewayOptions = {
  toolCallTimeoutMs: number;
  maxStreamingSteps?: number;
  now?: () => number;
};

const UNKNOWN_NETWORK = "unknown";

/**
 * The sandbox boundary. Every call is authenticated, validated, governed and
 * then driven to a terminal status before control returns to the script.
 */
export class ToolGateway {
  private readonly now: () => number;

  constructor(
    private readonly tokens: InvocationTokenAuthority,
    private readonly registry: ToolRegistry,
    private readonly pipeline: GovernancePipeline,
    private readonly log: Logger,
    private readonly opts: GatewayOptions
  ) {
    this.now = opts.now ?? Date.now;
  }

  listTools(): ToolListing[] {
    return this.registry.list();
  }

  async invoke(req: ToolCallRequest, opts: { signal?: AbortSignal } = {}): Promise<ToolCallResponse> {
    // Authentication is not a policy decision: no audit record, no pipeline.
    const auth = this.tokens.validate(req.invocation_token);
    if (!auth.ok) {
      this.log.warn({ tool: req.tool_name, reason: auth.reason }, "invocation token rejected");
      return fail(new AuthenticationFailure(`Invocation token rejected (${auth.reason})`).toPayload());
    }

    const callId = randomUUID();
    const deadline = deadlineController(this.opts.toolCallTimeoutMs, opts.signal);
    try {
      const response = await this.governed(callId, req, deadline.signal);
      this.log.info(
        { callId, tool: req.tool_name, evaluationId: auth.grant.evaluationId, status: response.status },
        "tool call finished"
      );
      return response;
    } finally {
      deadline.dispose();
    }
  }

  private async governed(callId: string, req: ToolCallRequest, signal: AbortSignal): Promise<ToolCallResponse> {
    const requestedAt = this.now();
    const tool = this.registry.get(req.tool_name);

    if (!tool) {
      // The policy stage rejects names outside the registry; nothing is dispatched.
      const ctx = buildContext(callId, req.tool_name, {}, requestedAt, { actionKind: "read", network: UNKNOWN_NETWORK });
      const result = await this.pipeline.run(ctx, { actionKind: "read", network: UNKNOWN_NETWORK, args: {} }, async () => ({
        status: "error",
        error: new ExecutionError(`unknown tool ${req.tool_name}`),
      }));
      return respond(result);
    }

    const prepared = tool.prepare(req.args ?? {});
    if (!prepared.ok) {
      const error = new SchemaViolation(tool.name, prepared.issues);
      const ctx = buildContext(callId, tool.name, {}, requestedAt, { actionKind: "read", network: UNKNOWN_NETWORK });
      this.pipeline.recordRejection(ctx, { actionKind: "read", network: UNKNOWN_NETWORK, args: {} }, "schema", error);
      return fail(error.toPayload());
    }

    const { call } = prepared;
    const auditArgs = redactArgs(call.args, tool.sensitiveArgs);

    let annotation: CallAnnotation;
    try {
      const raced = await raceDeadline(call.annotate(signal), { signal });
      if (raced.kind !== "value") throw new ExecutionError(`tool call abandoned: ${abortReason(signal)}`);
      annotation = raced.value;
    } catch (e) {
      const error = toExecutionError(e);
      const ctx = buildContext(callId, tool.name, call.args, requestedAt, { actionKind: "read", network: UNKNOWN_NETWORK });
      this.pipeline.recordRejection(ctx, { actionKind: "read", network: UNKNOWN_NETWORK, args: auditArgs }, "annotate", error);
      return fail(error.toPayload());
    }

    const ctx = buildContext(callId, tool.name, call.args, requestedAt, annotation);
    const auditContext: AuditContext = { ...annotation, args: auditArgs };
    const result = await this.pipeline.run(ctx, auditContext, () => this.drive(call.open(signal), signal));
    return respond(result);
  }

  /** Advances the session until done/error, or abandons it when the deadline fires. */
  private async drive(session: ToolSession, signal: AbortSignal): Promise<CallOutcome> {
    const maxSteps = this.opts.maxStreamingSteps ?? 1_000;

    for (let steps = 0; ; steps++) {
      if (steps > maxSteps) {
        session.cancel();
        return { status: "error", error: new ExecutionError(`tool exceeded ${maxSteps} streaming steps`) };
      }

      const raced = await raceDeadline(session.advance(), { signal });
      if (raced.kind !== "value") {
        session.cancel();
        return { status: "abandoned", reason: abortReason(signal) };
      }

      const step = raced.value;
      if (step.status === "done") return { status: "done", output: step.output };
      if (step.status === "error") return { status: "error", error: step.error };
    }
  }
}

function buildContext(
  callId: string,
  toolName: string,
  args: Readonly<Record<string, unknown>>,
  requestedAt: number,
  annotation: CallAnnotation
): ToolCallContext {
  return deepFreeze({ callId, toolName, args, requestedAt, ...annotation });
}

function fail(error: ErrorPayload): ToolCallResponse {
  return { status: "error", error };
}

function respond(result: PipelineResult): ToolCallResponse {
  switch (result.status) {
    case "blocked":
      return fail(result.decision.error.toPayload());
    case "done":
      return { status: "done", output: result.output };
    case "error":
      return fail(result.error.toPayload());
    case "abandoned":
      return fail(new ExecutionError(`tool call abandoned: ${result.reason}`).toPayload());
  }
}
