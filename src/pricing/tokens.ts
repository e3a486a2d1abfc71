import fs from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";
import { FatalConfiguration } from "../errors.js";

export type TokenInfo = {
  network: string; // "*" = any network
  address: string; // lowercase
  symbol: string;
  decimals: number;
  stablecoin: boolean;
};

const TokenFileSchema = z.object({
  tokens: z.array(
    z.object({
      network: z.string().min(1),
      address: z.string().regex(/^0x[0-9a-fA-F]{40}$/),
      symbol: z.string().min(1),
      decimals: z.number().int().min(0).max(36),
      stablecoin: z.boolean(),
    })
  ),
});

export const DEFAULT_TOKENS_PATH = fileURLToPath(new URL("../../data/tokens.json", import.meta.url));

export class TokenTable {
  private readonly byKey = new Map<string, TokenInfo>();

  constructor(tokens: readonly TokenInfo[]) {
    for (const t of tokens) {
      const info = Object.freeze({ ...t, address: t.address.toLowerCase() });
      this.byKey.set(`${info.network}:${info.address}`, info);
    }
  }

  static load(filePath = DEFAULT_TOKENS_PATH): TokenTable {
    let raw: unknown;
    try {
      raw = JSON.parse(fs.readFileSync(filePath, "utf8"));
    } catch {
      throw new FatalConfiguration(`Token table ${filePath} cannot be read`);
    }
    const parsed = TokenFileSchema.safeParse(raw);
    if (!parsed.success) throw new FatalConfiguration(`Token table ${filePath} is malformed`);
    return new TokenTable(parsed.data.tokens);
  }

  lookup(network: string, address: string): TokenInfo | undefined {
    const a = address.toLowerCase();
    return this.byKey.get(`${network}:${a}`) ?? this.byKey.get(`*:${a}`);
  }

  /** Tokens deployed on exactly this network, in file order. */
  onNetwork(network: string): TokenInfo[] {
    return [...this.byKey.values()].filter((t) => t.network === network);
  }

  findBySymbol(network: string, symbol: string): TokenInfo | undefined {
    return this.onNetwork(network).find((t) => t.symbol === symbol);
  }
}
