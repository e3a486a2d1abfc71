import { formatUnits, getAddress, type Address } from "viem";
import { z } from "zod";
import type { TokenTable } from "../pricing/tokens.js";
import type { BalanceSource } from "../wallet/balances.js";
import { oneShot } from "./session.js";
import { NETWORKS } from "./swap.js";
import { defineTool, type RegisteredTool } from "./types.js";

const network = z.enum(NETWORKS).default("ethereum");

const WalletBalancesArgsSchema = z.discriminatedUnion("action", [
  z.object({ action: z.literal("native_balance"), network }).strict(),
  z
    .object({
      action: z.literal("token_balance"),
      network,
      token_address: z.string().regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x address"),
    })
    .strict(),
  z.object({ action: z.literal("all_balances"), network }).strict(),
]);

type WalletBalancesArgs = z.infer<typeof WalletBalancesArgsSchema>;

type BalanceRow = {
  token: string;
  symbol: string;
  decimals: number;
  balance_raw: string;
  balance_formatted: string;
  is_native: boolean;
};

const NATIVE = { token: "native", symbol: "ETH", decimals: 18 } as const;

function row(token: string, symbol: string, decimals: number, raw: bigint, isNative: boolean): BalanceRow {
  return {
    token,
    symbol,
    decimals,
    balance_raw: raw.toString(),
    balance_formatted: formatUnits(raw, decimals),
    is_native: isNative,
  };
}

/**
 * Native and ERC-20 balances of the gateway's own wallet. Only the public
 * address leaves the wallet module.
 */
export function createWalletBalancesTool(owner: Address, source: BalanceSource, tokens: TokenTable): RegisteredTool {
  return defineTool<WalletBalancesArgs>({
    name: "wallet_balances",
    description: "Native and ERC-20 balances of the gateway wallet on one network (read-only).",
    schema: WalletBalancesArgsSchema,
    annotate: (args) => ({ actionKind: "read", network: args.network }),
    open(args, signal) {
      const native = async () =>
        row(NATIVE.token, NATIVE.symbol, NATIVE.decimals, await source.nativeBalance(args.network, owner, signal), true);

      const token = async (address: string) => {
        const checksummed = getAddress(address);
        const info = tokens.lookup(args.network, checksummed);
        const raw = await source.tokenBalance(args.network, checksummed, owner, signal);
        // Unknown tokens are reported in base units only.
        return row(checksummed, info?.symbol ?? "UNKNOWN", info?.decimals ?? 0, raw, false);
      };

      switch (args.action) {
        case "native_balance":
          return oneShot(async () => ({ action: args.action, network: args.network, address: owner, ...(await native()) }));

        case "token_balance":
          return oneShot(async () => ({
            action: args.action,
            network: args.network,
            address: owner,
            ...(await token(args.token_address)),
          }));

        case "all_balances":
          return oneShot(async () => {
            const balances: BalanceRow[] = [await native()];
            for (const t of tokens.onNetwork(args.network)) balances.push(await token(t.address));
            return { action: args.action, network: args.network, address: owner, balances };
          });
      }
    },
  });
}
