import { z } from "zod";
import type { TokenTable } from "../pricing/tokens.js";
import type { TradeValuator } from "../pricing/valuation.js";
import { raceDeadline } from "../utils/deadline.js";
import { ExecutionError } from "../errors.js";
import { oneShot } from "./session.js";
import { defineTool, type CallAnnotation, type RegisteredTool } from "./types.js";

export const NETWORKS = ["ethereum", "arbitrum", "optimism", "base"] as const;
export type Network = (typeof NETWORKS)[number];

export const DEFAULT_SLIPPAGE_PERCENT = 0.5;

export type SwapRequest = {
  network: Network;
  inputToken: string;
  outputToken: string;
  amount: string; // input, base units
  slippagePercent: number;
};

export type SwapQuote = {
  network: Network;
  inputToken: string;
  outputToken: string;
  inputAmount: string;
  outputAmount: string;
  priceImpactPercent: number;
};

export type PreparedSwap = SwapQuote & {
  status: "prepared" | "paper_filled";
  reference: string;
  note: string;
};

/** Quote and preparation backend. Never signs or broadcasts. */
export interface SwapClient {
  quote(req: SwapRequest, signal: AbortSignal): Promise<SwapQuote>;
  prepareSwap(req: SwapRequest, signal: AbortSignal): Promise<PreparedSwap>;
}

const address = z.string().regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x address");

export const SwapArgsSchema = z
  .object({
    action: z.enum(["quote", "prepare_swap"]),
    network: z.enum(NETWORKS).default("ethereum"),
    input_token: address,
    output_token: address,
    amount: z.string().regex(/^[1-9][0-9]{0,77}$/, "must be a positive integer in base units"),
    amount_usd: z.number().finite().nonnegative().optional(),
    slippage_percent: z.number().finite().positive().max(100).optional(),
  })
  .strict()
  .refine((a) => a.input_token.toLowerCase() !== a.output_token.toLowerCase(), {
    message: "input_token and output_token must differ",
    path: ["output_token"],
  });

export type SwapArgs = z.infer<typeof SwapArgsSchema>;

function toRequest(args: SwapArgs): SwapRequest {
  return {
    network: args.network,
    inputToken: args.input_token,
    outputToken: args.output_token,
    amount: args.amount,
    slippagePercent: args.slippage_percent ?? DEFAULT_SLIPPAGE_PERCENT,
  };
}

export type SwapToolDeps = {
  client: SwapClient;
  valuator: TradeValuator;
  tokens: TokenTable;
  quoteTimeoutMs: number;
};

/**
 * `quote` is read-only. `prepare_swap` commits capital: before governance it
 * is valued in USD and quoted once so the slippage guard sees the price
 * impact the swap would have.
 */
export function createSwapTool(deps: SwapToolDeps): RegisteredTool {
  return defineTool<SwapArgs>({
    name: "swap",
    description: "Quote a token swap, or prepare one for execution (capital-committing).",
    schema: SwapArgsSchema,

    async annotate(args, signal): Promise<CallAnnotation> {
      if (args.action === "quote") return { actionKind: "read", network: args.network };

      const req = toRequest(args);
      const valuation = await deps.valuator.value(
        { network: args.network, inputToken: args.input_token, amount: args.amount, amountUsd: args.amount_usd },
        signal
      );

      const raced = await raceDeadline(deps.client.quote(req, signal), { timeoutMs: deps.quoteTimeoutMs, signal });
      if (raced.kind !== "value") throw new ExecutionError(`pre-trade quote ${raced.kind === "timeout" ? "timed out" : "cancelled"}`);

      const out = deps.tokens.lookup(args.network, args.output_token);
      return {
        actionKind: "commit",
        network: args.network,
        tradeValueUsd: valuation.valueUsd,
        priceImpactPercent: raced.value.priceImpactPercent,
        slippagePercent: req.slippagePercent,
        symbol: out?.symbol ?? args.output_token.toLowerCase(),
      };
    },

    open(args, signal) {
      const req = toRequest(args);
      if (args.action === "quote") return oneShot(async () => ({ action: "quote", ...(await deps.client.quote(req, signal)) }));
      return oneShot(async () => ({ action: "prepare_swap", ...(await deps.client.prepareSwap(req, signal)) }));
    },
  });
}
