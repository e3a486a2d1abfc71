import { describe, it, expect } from "vitest";
import { GeneratorSession, oneShot, type StepSource } from "../../src/tools/session.js";
import { WalletError } from "../../src/wallet/secure-wallet.js";

describe("GeneratorSession", () => {
  it("moves sent -> streaming -> done", async () => {
    async function* steps(): StepSource {
      yield { page: 1 };
      yield { page: 2 };
      return { pages: 2 };
    }
    const session = new GeneratorSession(steps());
    expect(session.state).toBe("sent");

    expect(await session.advance()).toEqual({ status: "streaming", chunk: { page: 1 } });
    expect(session.state).toBe("streaming");
    expect(await session.advance()).toEqual({ status: "streaming", chunk: { page: 2 } });
    expect(await session.advance()).toEqual({ status: "done", output: { pages: 2 } });
    expect(session.state).toBe("done");

    await expect(session.advance()).rejects.toThrow("cannot advance a session in state done");
  });

  it("turns a thrown error into an error step", async () => {
    async function* steps(): StepSource {
      throw new Error("upstream 502");
    }
    const session = new GeneratorSession(steps());
    const step = await session.advance();

    expect(step.status).toBe("error");
    if (step.status !== "error") return;
    expect(step.error.message).toBe("upstream 502");
    expect(session.state).toBe("error");
  });

  it("passes wallet failures through with their fixed message", async () => {
    const session = oneShot(async () => {
      throw new WalletError("signing failed");
    });
    const step = await session.advance();

    expect(step.status).toBe("error");
    if (step.status !== "error") return;
    expect(step.error.toPayload()).toEqual({
      kind: "ExecutionError",
      message: "signing failed",
      details: { source: "wallet" },
    });
  });

  it("reports a step that lands after cancel as an error", async () => {
    let openGate: () => void = () => undefined;
    const gate = new Promise<void>((resolve) => {
      openGate = resolve;
    });
    async function* steps(): StepSource {
      await gate;
      return { late: true };
    }
    const session = new GeneratorSession(steps());

    const pending = session.advance();
    session.cancel();
    openGate();

    const step = await pending;
    expect(step.status).toBe("error");
    expect(session.state).toBe("cancelled");
  });

  it("completes a one-shot call in a single step", async () => {
    const session = oneShot(async () => ({ address: "0xabc" }));
    expect(await session.advance()).toEqual({ status: "done", output: { address: "0xabc" } });
  });
});
