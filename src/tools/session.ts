import { ExecutionError, toExecutionError } from "../errors.js";
import { WalletError } from "../wallet/secure-wallet.js";

export type SessionState = "sent" | "streaming" | "done" | "error" | "cancelled";

export type SessionStep =
  | { status: "streaming"; chunk: unknown }
  | { status: "done"; output: Record<string, unknown> }
  | { status: "error"; error: ExecutionError };

/**
 * One tool call in flight. `advance()` moves it one step:
 *
 *   sent -> streaming* -> done | error
 *
 * Advancing a terminal or cancelled session is a programming error.
 */
export interface ToolSession {
  readonly state: SessionState;
  advance(): Promise<SessionStep>;
  cancel(): void;
}

export type StepSource = AsyncGenerator<unknown, Record<string, unknown>, void>;

function sessionError(e: unknown): ExecutionError {
  // Wallet messages are fixed strings; pass them through verbatim.
  if (e instanceof WalletError) return new ExecutionError(e.message, { source: "wallet" });
  return toExecutionError(e);
}

export class GeneratorSession implements ToolSession {
  private current: SessionState = "sent";

  constructor(private readonly source: StepSource) {}

  get state(): SessionState {
    return this.current;
  }

  async advance(): Promise<SessionStep> {
    if (this.current !== "sent" && this.current !== "streaming") {
      throw new Error(`cannot advance a session in state ${this.current}`);
    }

    try {
      const step = await this.source.next();
      if (this.state === "cancelled") {
        return { status: "error", error: new ExecutionError("tool call cancelled") };
      }
      if (step.done) {
        this.current = "done";
        return { status: "done", output: step.value };
      }
      this.current = "streaming";
      return { status: "streaming", chunk: step.value };
    } catch (e) {
      if (this.state !== "cancelled") this.current = "error";
      return { status: "error", error: sessionError(e) };
    }
  }

  cancel(): void {
    if (this.current === "done" || this.current === "error") return;
    // The underlying work stops through the abort signal it was opened with.
    this.current = "cancelled";
  }
}

/** A call that completes in a single step. */
export function oneShot(run: () => Promise<Record<string, unknown>>): ToolSession {
  async function* steps(): StepSource {
    return await run();
  }
  return new GeneratorSession(steps());
}
