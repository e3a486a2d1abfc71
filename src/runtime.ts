import type { GatewayConfig } from "./config.js";
import { FatalConfiguration } from "./errors.js";
import { JsonlAuditSink, type AuditSink } from "./engine/audit.js";
import { CooldownGate } from "./engine/cooldown.js";
import { GovernancePipeline } from "./engine/pipeline.js";
import { PolicyInterceptor, PolicyStore } from "./engine/policy.js";
import { SlippageGuard } from "./engine/slippage-guard.js";
import { MemorySpendLedger, type SpendLedger } from "./engine/spend-ledger.js";
import { SpendLimitTracker } from "./engine/spend-limit.js";
import { SqliteSpendLedger } from "./engine/sqlite-spend-ledger.js";
import { ToolGateway } from "./gateway.js";
import type { Logger } from "./logger.js";
import { PaperLedger } from "./paper/paper-ledger.js";
import { PaperPortfolio } from "./paper/paper-portfolio.js";
import { PaperSwapClient } from "./paper/paper-swap.js";
import { TokenTable } from "./pricing/tokens.js";
import { StaticPriceSource, TradeValuator, type PriceSource } from "./pricing/valuation.js";
import { InvocationTokenAuthority } from "./security/invocation-tokens.js";
import { createPaperPortfolioTool } from "./tools/paper-portfolio.js";
import { GraphPoolSource, createQueryPoolsTool, type PoolDataSource } from "./tools/pools.js";
import { ToolRegistry } from "./tools/registry.js";
import { createSwapTool, type SwapClient } from "./tools/swap.js";
import { KNOWN_TOOL_NAMES, type RegisteredTool } from "./tools/types.js";
import { createWalletBalancesTool } from "./tools/wallet-balances.js";
import { createWalletTools } from "./tools/wallet-tools.js";
import { ViemBalanceSource, type BalanceSource } from "./wallet/balances.js";
import type { SecureWallet } from "./wallet/secure-wallet.js";

/** Collaborators a host may swap out; everything else comes from config. */
export type RuntimeOverrides = {
  wallet?: SecureWallet;
  swapClient?: SwapClient;
  priceSource?: PriceSource;
  poolSource?: PoolDataSource;
  balanceSource?: BalanceSource;
  spendLedger?: SpendLedger;
  audit?: AuditSink;
  tokens?: TokenTable;
  policy?: PolicyStore;
  now?: () => number;
};

export type Runtime = {
  gateway: ToolGateway;
  pipeline: GovernancePipeline;
  policy: PolicyStore;
  registry: ToolRegistry;
  tokens: InvocationTokenAuthority;
  spendLimit: SpendLimitTracker;
  cooldown: CooldownGate;
  // Present when the built-in paper swap backend is in use.
  paper?: PaperPortfolio;
  close(): void;
};

function createSpendLedger(cfg: GatewayConfig): SpendLedger {
  if (cfg.spendLedger.kind === "memory") return new MemorySpendLedger(cfg.limits.historyLimit);
  return new SqliteSpendLedger({
    filePath: cfg.spendLedger.filePath,
    historyLimit: cfg.limits.historyLimit,
    staleReservationMs: cfg.timeouts.toolCallMs * 2,
  });
}

/**
 * Wires the gateway in dependency order. Throws FatalConfiguration for a
 * missing wallet or a bad policy document; nothing serves calls after that.
 */
export function createRuntime(cfg: GatewayConfig, log: Logger, overrides: RuntimeOverrides = {}): Runtime {
  const now = overrides.now ?? Date.now;
  const tokenTable = overrides.tokens ?? TokenTable.load();

  const priceSource = overrides.priceSource ?? new StaticPriceSource(cfg.paperPricesUsd);
  const valuator = new TradeValuator(tokenTable, log.child({ component: "valuation" }), {
    priceSource,
    lookupTimeoutMs: cfg.timeouts.priceLookupMs,
  });

  const paper = overrides.swapClient
    ? undefined
    : PaperPortfolio.open(
        tokenTable,
        new PaperLedger(cfg.paperLedgerPath),
        { network: cfg.paper.network, initialBalances: cfg.paper.initialBalances, pricesUsd: cfg.paperPricesUsd, now },
        log.child({ component: "paper" })
      );
  const swapClient =
    overrides.swapClient ?? (paper && new PaperSwapClient(tokenTable, paper, { pricesUsd: cfg.paperPricesUsd }));
  if (!swapClient) throw new FatalConfiguration("no swap backend configured");

  const tools: RegisteredTool[] = [];
  if (cfg.walletToolsEnabled) {
    if (!overrides.wallet) throw new FatalConfiguration("wallet tools enabled but no key material was loaded");
    tools.push(...createWalletTools(overrides.wallet));

    const balanceSource =
      overrides.balanceSource ??
      (Object.keys(cfg.rpcUrls).length > 0 ? new ViemBalanceSource(cfg.rpcUrls, cfg.timeouts.priceLookupMs) : undefined);
    if (balanceSource) tools.push(createWalletBalancesTool(overrides.wallet.address, balanceSource, tokenTable));
  }
  tools.push(createSwapTool({ client: swapClient, valuator, tokens: tokenTable, quoteTimeoutMs: cfg.timeouts.priceLookupMs }));

  const poolSource =
    overrides.poolSource ??
    (Object.keys(cfg.poolSources).length > 0 ? new GraphPoolSource(cfg.poolSources, cfg.timeouts.priceLookupMs) : undefined);
  if (poolSource) tools.push(createQueryPoolsTool(poolSource));
  if (paper) tools.push(createPaperPortfolioTool(paper));

  const registry = new ToolRegistry(tools);
  const policy = overrides.policy ?? PolicyStore.fromFile(cfg.policyPath, KNOWN_TOOL_NAMES);

  const ledger = overrides.spendLedger ?? createSpendLedger(cfg);
  const spendLimit = new SpendLimitTracker(
    {
      maxPerTradeUsd: cfg.limits.maxTradeUsd,
      maxDailyUsd: cfg.limits.maxDailyUsd,
      unpricedTradePolicy: cfg.limits.unpricedTradePolicy,
    },
    ledger,
    log.child({ component: "spend-limit" }),
    now
  );
  const cooldown = new CooldownGate(
    { cooldownSeconds: cfg.cooldown.seconds, scope: cfg.cooldown.scope },
    log.child({ component: "cooldown" }),
    now
  );

  const pipeline = new GovernancePipeline(
    {
      policy: new PolicyInterceptor(policy, registry.names, log.child({ component: "policy" })),
      spendLimit,
      slippage: new SlippageGuard({
        maxSlippagePercent: cfg.slippage.maxSlippagePercent,
        maxPriceImpactPercent: cfg.slippage.maxPriceImpactPercent,
      }),
      cooldown,
    },
    {
      audit: overrides.audit ?? new JsonlAuditSink(cfg.auditLogPath),
      log: log.child({ component: "pipeline" }),
      stageTimeoutMs: cfg.timeouts.stageMs,
      now,
    }
  );

  const tokens = new InvocationTokenAuthority({ ttlMs: cfg.timeouts.tokenTtlMs, now });
  const gateway = new ToolGateway(tokens, registry, pipeline, log.child({ component: "gateway" }), {
    toolCallTimeoutMs: cfg.timeouts.toolCallMs,
    now,
  });

  return {
    gateway,
    pipeline,
    policy,
    registry,
    tokens,
    spendLimit,
    cooldown,
    paper,
    close: () => ledger.close?.(),
  };
}
