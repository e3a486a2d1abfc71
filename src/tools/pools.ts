import { z } from "zod";
import { ExecutionError } from "../errors.js";
import { fetchWithTimeout } from "../utils/deadline.js";
import { oneShot, GeneratorSession, type StepSource } from "./session.js";
import { NETWORKS } from "./swap.js";
import { defineTool, type RegisteredTool } from "./types.js";

export type Pool = {
  id: string;
  token0: string;
  token1: string;
  feeTier: number;
  tvlUsd: number;
  volumeUsd: number;
};

export type PoolQuery = {
  network: string;
  token?: string;
  first: number;
  skip: number;
};

/** Paged market-data backend for the query_pools tool. */
export interface PoolDataSource {
  readonly pageSize: number;
  fetchPage(query: PoolQuery, signal: AbortSignal): Promise<Pool[]>;
}

const PoolsResponseSchema = z.object({
  data: z.object({
    pools: z.array(
      z.object({
        id: z.string(),
        feeTier: z.coerce.number(),
        totalValueLockedUSD: z.coerce.number(),
        volumeUSD: z.coerce.number(),
        token0: z.object({ symbol: z.string() }),
        token1: z.object({ symbol: z.string() }),
      })
    ),
  }),
});

const POOLS_QUERY = `
  query Pools($first: Int!, $skip: Int!, $where: Pool_filter) {
    pools(first: $first, skip: $skip, where: $where, orderBy: totalValueLockedUSD, orderDirection: desc) {
      id
      feeTier
      totalValueLockedUSD
      volumeUSD
      token0 { symbol }
      token1 { symbol }
    }
  }
`;

/** Subgraph-style GraphQL endpoint, one URL per network. */
export class GraphPoolSource implements PoolDataSource {
  readonly pageSize = 25;

  constructor(
    private readonly endpoints: Readonly<Record<string, string>>,
    private readonly timeoutMs: number
  ) {}

  async fetchPage(query: PoolQuery, signal: AbortSignal): Promise<Pool[]> {
    const url = this.endpoints[query.network] ?? this.endpoints["*"];
    if (!url) throw new ExecutionError(`no pool source configured for ${query.network}`);

    const where = query.token ? { or: [{ token0: query.token }, { token1: query.token }] } : undefined;
    const res = await fetchWithTimeout(
      url,
      {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ query: POOLS_QUERY, variables: { first: query.first, skip: query.skip, where } }),
      },
      this.timeoutMs,
      signal
    );
    if (!res.ok) throw new ExecutionError(`pool source responded ${res.status}`);

    const parsed = PoolsResponseSchema.safeParse(await res.json());
    if (!parsed.success) throw new ExecutionError("pool source returned an unexpected shape");

    return parsed.data.data.pools.map((p) => ({
      id: p.id,
      token0: p.token0.symbol,
      token1: p.token1.symbol,
      feeTier: p.feeTier,
      tvlUsd: p.totalValueLockedUSD,
      volumeUsd: p.volumeUSD,
    }));
  }
}

const QueryPoolsArgsSchema = z
  .object({
    network: z.enum(NETWORKS).default("ethereum"),
    token: z
      .string()
      .regex(/^0x[0-9a-fA-F]{40}$/, "must be a 0x address")
      .transform((t) => t.toLowerCase())
      .optional(),
    limit: z.number().int().min(1).max(100).default(10),
  })
  .strict();

type QueryPoolsArgs = z.infer<typeof QueryPoolsArgsSchema>;

/** Top pools by TVL. Multi-page results stream one page per step. */
export function createQueryPoolsTool(source: PoolDataSource): RegisteredTool {
  return defineTool<QueryPoolsArgs>({
    name: "query_pools",
    description: "List liquidity pools by TVL, optionally filtered by token (read-only).",
    schema: QueryPoolsArgsSchema,
    annotate: (args) => ({ actionKind: "read", network: args.network }),
    open(args, signal) {
      if (args.limit <= source.pageSize) {
        return oneShot(async () => ({
          network: args.network,
          pools: await source.fetchPage({ network: args.network, token: args.token, first: args.limit, skip: 0 }, signal),
        }));
      }

      async function* pages(): StepSource {
        const pools: Pool[] = [];
        while (pools.length < args.limit) {
          const first = Math.min(source.pageSize, args.limit - pools.length);
          const page = await source.fetchPage(
            { network: args.network, token: args.token, first, skip: pools.length },
            signal
          );
          pools.push(...page);
          if (page.length < first) break;
          yield { fetched: pools.length };
        }
        return { network: args.network, pools };
      }
      return new GeneratorSession(pages());
    },
  });
}
