// src/config.ts
import path from "node:path";
import { z } from "zod";
import { FatalConfiguration } from "./errors.js";
import type { CooldownScope } from "./engine/cooldown.js";
import type { UnpricedTradePolicy } from "./engine/spend-limit.js";
import { NETWORKS } from "./tools/swap.js";

export type SpendLedgerConfig = { kind: "memory" } | { kind: "sqlite"; filePath: string };

export type GatewayConfig = {
  policyPath: string;
  walletToolsEnabled: boolean;

  limits: {
    maxTradeUsd: number;
    maxDailyUsd: number;
    historyLimit: number;
    unpricedTradePolicy: UnpricedTradePolicy;
  };
  slippage: {
    maxSlippagePercent: number;
    maxPriceImpactPercent: number;
  };
  cooldown: {
    seconds: number;
    scope: CooldownScope;
  };
  timeouts: {
    priceLookupMs: number;
    stageMs: number;
    toolCallMs: number;
    tokenTtlMs: number;
  };

  spendLedger: SpendLedgerConfig;
  auditLogPath: string;
  paperLedgerPath: string;
  paperPricesUsd: Record<string, number>;
  paper: {
    network: string;
    // symbol -> decimal amount credited on `network` before the ledger is replayed
    initialBalances: Record<string, string>;
  };
  // network -> GraphQL endpoint ("*" = any); empty disables query_pools
  poolSources: Record<string, string>;
  // network -> JSON-RPC endpoint; empty disables wallet_balances
  rpcUrls: Record<string, string>;

  server: { port: number; bindHost: string };
  // empty = any caller that can reach the bind host
  ipAllowlist: string[];
  // express "trust proxy"; false means X-Forwarded-For is ignored
  trustProxy: boolean | number | string;
  logLevel: string;
};

type Env = Record<string, string | undefined>;

function envString(env: Env, name: string, fallback?: string): string {
  const raw = (env[name] ?? "").trim();
  if (raw) return raw;
  if (fallback !== undefined) return fallback;
  throw new FatalConfiguration(`${name} must be set`);
}

function parseTrustProxy(raw: string): boolean | number | string {
  if (raw === "" || raw === "false") return false;
  if (raw === "true") return true;
  if (/^[0-9]+$/.test(raw)) return Number(raw);
  return raw;
}

function envNumber(env: Env, name: string, fallback: number, opts: { min?: number; integer?: boolean } = {}): number {
  const raw = (env[name] ?? "").trim();
  const n = raw === "" ? fallback : Number(raw);
  if (!Number.isFinite(n)) throw new FatalConfiguration(`${name} must be a number (got: ${raw})`);
  if (opts.integer && !Number.isInteger(n)) throw new FatalConfiguration(`${name} must be an integer`);
  if (opts.min !== undefined && n < opts.min) throw new FatalConfiguration(`${name} must be >= ${opts.min}`);
  return n;
}

function envPositive(env: Env, name: string, fallback: number): number {
  const n = envNumber(env, name, fallback);
  if (n <= 0) throw new FatalConfiguration(`${name} must be > 0`);
  return n;
}

function envBool(env: Env, name: string, fallback: boolean): boolean {
  const raw = (env[name] ?? "").trim().toLowerCase();
  if (raw === "") return fallback;
  if (raw === "true") return true;
  if (raw === "false") return false;
  throw new FatalConfiguration(`${name} must be true or false`);
}

function envEnum<T extends string>(env: Env, name: string, allowed: readonly T[], fallback?: T): T {
  const raw = (env[name] ?? "").trim();
  if (raw === "") {
    if (fallback !== undefined) return fallback;
    throw new FatalConfiguration(`${name} must be set to one of: ${allowed.join(", ")}`);
  }
  const hit = allowed.find((a) => a === raw);
  if (!hit) throw new FatalConfiguration(`${name} must be one of: ${allowed.join(", ")} (got: ${raw})`);
  return hit;
}

function envJson<T>(env: Env, name: string, schema: z.ZodType<T, z.ZodTypeDef, unknown>, fallback: T): T {
  const raw = (env[name] ?? "").trim();
  if (raw === "") return fallback;
  let parsed: unknown;
  try {
    parsed = JSON.parse(raw);
  } catch {
    throw new FatalConfiguration(`${name} must be valid JSON`);
  }
  const result = schema.safeParse(parsed);
  if (!result.success) throw new FatalConfiguration(`${name} has an invalid shape`);
  return result.data;
}

const PricesSchema = z.record(z.string(), z.number().positive().finite());

const BalancesSchema = z.record(z.string(), z.string().regex(/^[0-9]+(\.[0-9]+)?$/));

// "https://..." for every network (when allowed), or "base=https://...,ethereum=https://..."
function parseEndpoints(name: string, raw: string, opts: { wildcard: boolean }): Record<string, string> {
  if (raw === "") return {};
  const out: Record<string, string> = {};
  for (const part of raw.split(",").map((s) => s.trim()).filter(Boolean)) {
    const eq = part.indexOf("=");
    const [network, url] = eq > 0 && !part.startsWith("http") ? [part.slice(0, eq), part.slice(eq + 1)] : ["*", part];
    if (network === "*" && !opts.wildcard) throw new FatalConfiguration(`${name} entries must be network=url`);
    try {
      const u = new URL(url);
      if (u.protocol !== "https:" && u.protocol !== "http:") throw new Error("protocol");
    } catch {
      throw new FatalConfiguration(`${name} entry for ${network} is not an http(s) URL`);
    }
    out[network] = url;
  }
  return out;
}

/**
 * Reads every setting once, fail-closed: malformed values and unsafe
 * combinations stop startup instead of falling back to something permissive.
 * Key material is deliberately not part of this object.
 */
export function loadGatewayConfigFromEnv(env: Env = process.env, opts?: { projectRoot?: string }): GatewayConfig {
  const projectRoot = opts?.projectRoot ?? process.cwd();
  const securityDir = path.join(projectRoot, ".security");
  const resolve = (p: string) => path.resolve(projectRoot, p);

  const maxTradeUsd = envPositive(env, "MAX_TRADE_USD", 100);
  const maxDailyUsd = envPositive(env, "MAX_DAILY_USD", 500);
  if (maxTradeUsd > maxDailyUsd) {
    throw new FatalConfiguration("MAX_TRADE_USD must not exceed MAX_DAILY_USD");
  }

  // Mandatory: there is no implicit default for unpriced trades.
  const unpricedTradePolicy = envEnum<UnpricedTradePolicy>(env, "UNPRICED_TRADE_POLICY", ["fail-open", "fail-closed"]);

  const ledgerKind = envEnum(env, "SPEND_LEDGER", ["memory", "sqlite"] as const, "memory");
  const spendLedger: SpendLedgerConfig =
    ledgerKind === "sqlite"
      ? { kind: "sqlite", filePath: resolve(envString(env, "SPEND_LEDGER_PATH", path.join(securityDir, "spend-ledger.db"))) }
      : { kind: "memory" };

  const toolCallMs = envPositive(env, "TOOL_CALL_TIMEOUT_MS", 30_000);
  const stageMs = envPositive(env, "STAGE_TIMEOUT_MS", 3_000);
  if (stageMs > toolCallMs) throw new FatalConfiguration("STAGE_TIMEOUT_MS must not exceed TOOL_CALL_TIMEOUT_MS");

  const rpcUrls = parseEndpoints("RPC_URLS", (env.RPC_URLS ?? "").trim(), { wildcard: false });
  const knownNetworks: readonly string[] = NETWORKS;
  for (const network of Object.keys(rpcUrls)) {
    if (!knownNetworks.includes(network)) throw new FatalConfiguration(`RPC_URLS names an unsupported network: ${network}`);
  }

  return {
    policyPath: resolve(envString(env, "POLICY_PATH", path.join(securityDir, "policy.json"))),
    walletToolsEnabled: envBool(env, "WALLET_TOOLS_ENABLED", true),

    limits: {
      maxTradeUsd,
      maxDailyUsd,
      historyLimit: envNumber(env, "SPEND_HISTORY_LIMIT", 200, { min: 1, integer: true }),
      unpricedTradePolicy,
    },
    slippage: {
      maxSlippagePercent: envPositive(env, "MAX_SLIPPAGE_PERCENT", 1),
      maxPriceImpactPercent: envPositive(env, "MAX_PRICE_IMPACT_PERCENT", 2),
    },
    cooldown: {
      seconds: envNumber(env, "COOLDOWN_SECONDS", 300, { min: 0 }),
      scope: envEnum(env, "COOLDOWN_SCOPE", ["global", "per-symbol"] as const, "global"),
    },
    timeouts: {
      priceLookupMs: envPositive(env, "PRICE_LOOKUP_TIMEOUT_MS", 2_000),
      stageMs,
      toolCallMs,
      tokenTtlMs: envPositive(env, "INVOCATION_TOKEN_TTL_MS", 300_000),
    },

    spendLedger,
    auditLogPath: resolve(envString(env, "AUDIT_LOG_PATH", path.join(securityDir, "audit-log.jsonl"))),
    paperLedgerPath: resolve(envString(env, "PAPER_LEDGER_PATH", path.join(securityDir, "paper-ledger.jsonl"))),
    paperPricesUsd: envJson(env, "PAPER_PRICES_JSON", PricesSchema, { USDC: 1, USDT: 1, DAI: 1 }),
    paper: {
      network: envEnum(env, "PAPER_NETWORK", NETWORKS, "base"),
      initialBalances: envJson(env, "PAPER_INITIAL_BALANCES_JSON", BalancesSchema, { USDC: "10000" }),
    },
    poolSources: parseEndpoints("POOL_SOURCE_URL", (env.POOL_SOURCE_URL ?? "").trim(), { wildcard: true }),
    rpcUrls,

    server: {
      port: envNumber(env, "PORT", 3000, { min: 1, integer: true }),
      bindHost: envString(env, "BIND_HOST", "127.0.0.1"),
    },
    ipAllowlist: (env.IP_ALLOWLIST ?? "")
      .split(",")
      .map((s) => s.trim())
      .filter(Boolean),
    trustProxy: parseTrustProxy((env.TRUST_PROXY ?? "").trim()),
    logLevel: envEnum(env, "LOG_LEVEL", ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const, "info"),
  };
}
