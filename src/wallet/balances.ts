import { createPublicClient, erc20Abi, http, type Address, type Chain } from "viem";
import { arbitrum, base, mainnet, optimism } from "viem/chains";
import { ExecutionError } from "../errors.js";
import { raceDeadline } from "../utils/deadline.js";

/** Read-only on-chain balances. Never touches key material. */
export interface BalanceSource {
  nativeBalance(network: string, owner: Address, signal: AbortSignal): Promise<bigint>;
  tokenBalance(network: string, token: Address, owner: Address, signal: AbortSignal): Promise<bigint>;
}

const CHAINS: Readonly<Record<string, Chain>> = {
  ethereum: mainnet,
  arbitrum,
  optimism,
  base,
};

function createRpcClient(chain: Chain, url: string, timeoutMs: number) {
  return createPublicClient({ chain, transport: http(url, { timeout: timeoutMs }) });
}

type RpcClient = ReturnType<typeof createRpcClient>;

/** JSON-RPC balances through viem, one configured endpoint per network. */
export class ViemBalanceSource implements BalanceSource {
  private readonly clients = new Map<string, RpcClient>();

  constructor(
    private readonly rpcUrls: Readonly<Record<string, string>>,
    private readonly timeoutMs: number
  ) {}

  private client(network: string): RpcClient {
    const cached = this.clients.get(network);
    if (cached) return cached;

    const chain = CHAINS[network];
    const url = this.rpcUrls[network];
    if (!chain) throw new ExecutionError(`Unsupported network: ${network}`);
    if (!url) throw new ExecutionError(`no RPC endpoint configured for ${network}`);

    const client = createRpcClient(chain, url, this.timeoutMs);
    this.clients.set(network, client);
    return client;
  }

  private async bounded(work: Promise<bigint>, signal: AbortSignal): Promise<bigint> {
    const raced = await raceDeadline(work, { signal });
    if (raced.kind !== "value") throw new ExecutionError("balance query cancelled");
    return raced.value;
  }

  nativeBalance(network: string, owner: Address, signal: AbortSignal): Promise<bigint> {
    return this.bounded(this.client(network).getBalance({ address: owner }), signal);
  }

  tokenBalance(network: string, token: Address, owner: Address, signal: AbortSignal): Promise<bigint> {
    return this.bounded(
      this.client(network).readContract({ address: token, abi: erc20Abi, functionName: "balanceOf", args: [owner] }),
      signal
    );
  }
}
