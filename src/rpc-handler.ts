// src/rpc-handler.ts

import { z } from "zod";
import type { Request, Response } from "express";
import { errorMessage } from "./errors.js";
import type { ToolGateway } from "./gateway.js";
import type { Logger } from "./logger.js";

/* ======================================================
   JSON-RPC schema (strict envelope, tool args validated later)
====================================================== */

const RpcId = z.union([z.string(), z.number(), z.null()]);

const ListRequest = z.object({
  jsonrpc: z.literal("2.0"),
  id: RpcId.optional(),
  method: z.literal("tools/list"),
  params: z.object({}).passthrough().optional(),
});

const CallRequest = z.object({
  jsonrpc: z.literal("2.0"),
  id: RpcId.optional(),
  method: z.literal("tools/call"),
  params: z.object({
    tool_name: z.string().min(1).max(128),
    args: z.record(z.string(), z.unknown()).default({}),
    invocation_token: z.string().max(512).optional(),
  }),
});

const RpcRequest = z.discriminatedUnion("method", [ListRequest, CallRequest]);

type RpcIdValue = z.infer<typeof RpcId>;

export type RpcResponse =
  | { jsonrpc: "2.0"; id: RpcIdValue; result: unknown }
  | { jsonrpc: "2.0"; id: RpcIdValue; error: { code: number; message: string } };

function rpcError(id: RpcIdValue | undefined, code: number, message: string): RpcResponse {
  return { jsonrpc: "2.0", id: id ?? null, error: { code, message } };
}

function peekId(body: unknown): RpcIdValue {
  if (typeof body !== "object" || body === null) return null;
  const parsed = RpcId.safeParse(Reflect.get(body, "id"));
  return parsed.success ? parsed.data : null;
}

/* ======================================================
   MAIN HANDLER
====================================================== */

export async function handleRpc(body: unknown, gateway: ToolGateway, signal?: AbortSignal): Promise<RpcResponse> {
  const parsed = RpcRequest.safeParse(body);
  if (!parsed.success) return rpcError(peekId(body), -32600, "Invalid request");

  const request = parsed.data;
  const id = request.id ?? null;

  if (request.method === "tools/list") {
    return { jsonrpc: "2.0", id, result: { tools: gateway.listTools() } };
  }

  // Blocks and tool errors are results, not transport errors: the script
  // reasons over them.
  const result = await gateway.invoke(
    {
      tool_name: request.params.tool_name,
      args: request.params.args,
      invocation_token: request.params.invocation_token,
    },
    { signal }
  );
  return { jsonrpc: "2.0", id, result };
}

export function rpcRoute(gateway: ToolGateway, log: Logger) {
  return async (req: Request, res: Response) => {
    // Client went away: abandon the call so nothing is recorded for it.
    const controller = new AbortController();
    res.on("close", () => {
      if (!res.writableEnded) controller.abort(new Error("client disconnected"));
    });

    try {
      const out = await handleRpc(req.body, gateway, controller.signal);
      res.status(200).json(out);
    } catch (e) {
      log.error({ err: errorMessage(e) }, "rpc handler failed");
      res.status(200).json(rpcError(peekId(req.body), -32000, "Internal server error"));
    }
  };
}
