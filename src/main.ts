import "dotenv/config";
import path from "node:path";
import { setDefaultResultOrder } from "node:dns";
import { loadGatewayConfigFromEnv } from "./config.js";
import { errorMessage, FatalConfiguration } from "./errors.js";
import { createLogger } from "./logger.js";
import { createRuntime } from "./runtime.js";
import { TokenFile } from "./security/token-file.js";
import { createApp, startServer } from "./server.js";
import { loadWalletFromEnv } from "./wallet/secure-wallet.js";

// Prefer IPv4 first (localhost resolution differs across platforms)
setDefaultResultOrder("ipv4first");

const bootLog = createLogger({ level: process.env.LOG_LEVEL ?? "info" });

async function main(): Promise<void> {
  // Load config and fail closed BEFORE touching the key.
  const cfg = loadGatewayConfigFromEnv();
  const log = createLogger({ level: cfg.logLevel });

  const wallet = cfg.walletToolsEnabled ? loadWalletFromEnv() : undefined;
  const runtime = createRuntime(cfg, log, { wallet });

  // The local script host reads its token from disk before each evaluation; it is never logged.
  const tokenPath = path.join(path.dirname(cfg.auditLogPath), "invocation-token");
  const tokenFile = new TokenFile(runtime.tokens, tokenPath, log);
  tokenFile.start();

  process.on("SIGHUP", () => {
    try {
      const doc = runtime.policy.reload();
      log.info({ mode: doc.mode, rules: doc.rules.length }, "policy reloaded");
    } catch (e) {
      log.error({ err: errorMessage(e) }, "policy reload rejected; keeping previous document");
    }
  });

  const app = createApp({
    gateway: runtime.gateway,
    policy: runtime.policy,
    log,
    ipAllowlist: new Set(cfg.ipAllowlist),
    trustProxy: cfg.trustProxy,
  });
  const server = await startServer(app, { ...cfg.server, log });

  const shutdown = () => {
    tokenFile.dispose();
    server.close(() => {
      runtime.close();
      process.exit(0);
    });
  };
  process.once("SIGINT", shutdown);
  process.once("SIGTERM", shutdown);

  log.info(
    {
      policyMode: runtime.policy.current().mode,
      tools: [...runtime.registry.names],
      tokenPath,
      tokenRotateMs: tokenFile.rotateEveryMs,
    },
    "ready"
  );
}

main().catch((e: unknown) => {
  if (e instanceof FatalConfiguration) bootLog.fatal({ err: e.message, details: e.details }, "refusing to start");
  else bootLog.fatal({ err: errorMessage(e) }, "startup failed");
  process.exitCode = 1;
});
