import type { ToolCallContext } from "../../src/engine/types.js";

// Placeholder key material; never a real wallet.
export const TEST_KEY_BODY = "01".repeat(32);
export const TEST_PRIVATE_KEY = `0x${TEST_KEY_BODY}`;

export const BASE_USDC = "0x833589fcd6edb6e08f4c7c32d4f71b54bda02913";
export const BASE_WETH = "0x4200000000000000000000000000000000000006";
export const ETH_WETH = "0xc02aaa39b223fe8d0a0e5c4f27ead9083c756cc2";

let seq = 0;

export function makeCtx(overrides: Partial<ToolCallContext> = {}): ToolCallContext {
  seq++;
  return {
    callId: `call-${seq}`,
    toolName: "swap",
    args: {},
    actionKind: "commit",
    network: "base",
    requestedAt: 0,
    ...overrides,
  };
}

export class FakeClock {
  constructor(private t: number) {}

  readonly now = (): number => this.t;

  set(iso: string): void {
    this.t = Date.parse(iso);
  }

  advance(ms: number): void {
    this.t += ms;
  }
}

/** mulberry32 */
export function seededRandom(seed: number): () => number {
  let a = seed >>> 0;
  return () => {
    a = (a + 0x6d2b79f5) >>> 0;
    let t = a;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  };
}

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}
