import { z } from "zod";
import type { PaperPortfolio } from "../paper/paper-portfolio.js";
import { oneShot } from "./session.js";
import { NETWORKS } from "./swap.js";
import { defineTool, type RegisteredTool } from "./types.js";

const PaperPortfolioArgsSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("get_balances"), network: z.enum(NETWORKS).optional() }).strict(),
  z.object({ action: z.literal("get_metrics") }).strict(),
  z.object({ action: z.literal("get_trades"), limit: z.number().int().min(1).max(200).default(20) }).strict(),
]);

type PaperPortfolioArgs = z.infer<typeof PaperPortfolioArgsSchema>;

/** Read-only view of the simulated holdings behind the paper swap backend. */
export function createPaperPortfolioTool(portfolio: PaperPortfolio): RegisteredTool {
  return defineTool<PaperPortfolioArgs>({
    name: "paper_portfolio",
    description: "Paper trading balances, recent simulated fills and P&L metrics (read-only).",
    schema: PaperPortfolioArgsSchema,
    annotate: (args) => ({
      actionKind: "read",
      network: args.action === "get_balances" && args.network ? args.network : "paper",
    }),
    open(args) {
      switch (args.action) {
        case "get_balances":
          return oneShot(async () => ({
            action: "get_balances",
            balances: portfolio.balances(args.network).map((b) => ({
              network: b.network,
              token: b.token,
              symbol: b.symbol,
              decimals: b.decimals,
              balance_raw: b.balanceRaw,
              balance_formatted: b.balance,
              value_usd: b.valueUsd,
            })),
            note: "Paper trading balances (simulated)",
          }));

        case "get_metrics":
          return oneShot(async () => {
            const m = portfolio.metrics();
            return {
              action: "get_metrics",
              initial_balance_usd: m.initialBalanceUsd,
              current_value_usd: m.currentValueUsd,
              total_pnl_usd: m.totalPnlUsd,
              total_pnl_percent: m.totalPnlPercent,
              total_trades: m.totalTrades,
              total_volume_usd: m.totalVolumeUsd,
              unpriced_symbols: m.unpricedSymbols,
            };
          });

        case "get_trades":
          return oneShot(async () => {
            const trades = portfolio.trades(args.limit).map((f) => ({
              timestamp: f.ts,
              reference: f.fillId,
              network: f.network,
              input_token: f.inputToken,
              output_token: f.outputToken,
              input_amount: f.amountIn,
              output_amount: f.amountOut,
              trade_value_usd: f.valueUsd,
            }));
            return { action: "get_trades", trades, total_count: trades.length };
          });
      }
    },
  });
}
