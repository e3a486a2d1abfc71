import crypto from "node:crypto";
import type { Server } from "node:http";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import helmet from "helmet";
import rateLimit from "express-rate-limit";
import type { PolicyStore } from "./engine/policy.js";
import type { ToolGateway } from "./gateway.js";
import type { Logger } from "./logger.js";
import { rpcRoute } from "./rpc-handler.js";

export type AppDeps = {
  gateway: ToolGateway;
  policy: PolicyStore;
  log: Logger;
  // Optional allowlist; empty means any caller that can reach the bind host.
  ipAllowlist?: ReadonlySet<string>;
  // express "trust proxy"; X-Forwarded-For is ignored unless this is set.
  trustProxy?: TrustProxy;
};

export type TrustProxy = boolean | number | string;

function getClientIp(req: Request): string {
  return req.ip ?? req.socket.remoteAddress ?? "unknown";
}

export function createApp(deps: AppDeps): Express {
  const { gateway, policy, log } = deps;
  const app = express();
  app.disable("x-powered-by");
  app.set("trust proxy", deps.trustProxy ?? false);

  // Security headers
  app.use(helmet());

  // JSON body cap
  app.use(express.json({ limit: "32kb" }));

  // Access log: one line per request
  app.use((req: Request, res: Response, next: NextFunction) => {
    const rid = crypto.randomUUID();
    const ip = getClientIp(req);
    const start = Date.now();
    res.on("finish", () => {
      log.info({ rid, ip, method: req.method, path: req.path, status: res.statusCode, ms: Date.now() - start }, "http");
    });
    next();
  });

  app.use(
    rateLimit({
      windowMs: 60_000,
      limit: 120,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use(
    "/rpc",
    rateLimit({
      windowMs: 60_000,
      limit: 60,
      standardHeaders: true,
      legacyHeaders: false,
    })
  );

  app.use("/rpc", (req: Request, res: Response, next: NextFunction) => {
    const allow = deps.ipAllowlist;
    if (!allow || allow.size === 0) return next();
    if (!allow.has(getClientIp(req))) return res.status(403).json({ error: "Forbidden" });
    next();
  });

  app.get("/healthz", (_req: Request, res: Response) => {
    res.json({
      ok: true,
      policyMode: policy.current().mode,
      tools: gateway.listTools().map((t) => t.name),
    });
  });

  app.get("/rpc", (_req: Request, res: Response) => {
    res.status(405).send("This endpoint accepts POST JSON-RPC only.");
  });

  app.post("/rpc", rpcRoute(gateway, log));

  return app;
}

export function startServer(app: Express, opts: { port: number; bindHost: string; log: Logger }): Promise<Server> {
  return new Promise((resolve, reject) => {
    const server = app.listen(opts.port, opts.bindHost, () => {
      opts.log.info({ host: opts.bindHost, port: opts.port }, "tool gateway listening");
      resolve(server);
    });
    server.once("error", reject);
  });
}
