import { z } from "zod";
import { MAX_MESSAGE_CHARS, type SecureWallet } from "../wallet/secure-wallet.js";
import { oneShot } from "./session.js";
import { defineTool, type RegisteredTool } from "./types.js";

// Signing happens off-chain; the network tag only labels audit records.
const WALLET_NETWORK = "evm";

const DeriveArgsSchema = z.object({}).strict();

const SignMessageArgsSchema = z
  .object({
    message: z.string().min(1).max(MAX_MESSAGE_CHARS),
  })
  .strict();

const SignTxArgsSchema = z
  .object({
    tx_hash: z
      .string()
      .regex(/^0x[0-9a-fA-F]{64}$/, "must be 0x-prefixed 32-byte hex")
      .optional(),
    tx_bytes: z
      .string()
      .regex(/^0x(?:[0-9a-fA-F]{2})+$/, "must be 0x-prefixed, non-empty, even-length hex")
      .optional(),
  })
  .strict()
  .refine((a) => (a.tx_hash === undefined) !== (a.tx_bytes === undefined), {
    message: "provide exactly one of tx_hash or tx_bytes",
  });

type SignTxArgs = z.infer<typeof SignTxArgsSchema>;

/**
 * The signing ladder: derive (read) < sign message (sign) < sign tx (sign).
 * Each rung is its own tool so policy can gate them independently.
 */
export function createWalletTools(wallet: SecureWallet): RegisteredTool[] {
  const derive = defineTool<z.infer<typeof DeriveArgsSchema>>({
    name: "wallet_derive_address",
    description: "Return the wallet's public address.",
    schema: DeriveArgsSchema,
    annotate: () => ({ actionKind: "read", network: WALLET_NETWORK }),
    open: () => oneShot(async () => wallet.deriveAddress()),
  });

  const signMessage = defineTool<z.infer<typeof SignMessageArgsSchema>>({
    name: "wallet_sign_message",
    description: "Sign a personal message (EIP-191). Returns address, message_hash and signature.",
    schema: SignMessageArgsSchema,
    sensitiveArgs: ["message"],
    annotate: () => ({ actionKind: "sign", network: WALLET_NETWORK }),
    open: (args) => oneShot(async () => wallet.signMessage(args.message)),
  });

  const signTx = defineTool<SignTxArgs>({
    name: "wallet_sign_tx",
    description: "Sign a transaction hash, or keccak256 of raw transaction bytes.",
    schema: SignTxArgsSchema,
    sensitiveArgs: ["tx_bytes"],
    annotate: () => ({ actionKind: "sign", network: WALLET_NETWORK }),
    open: (args) =>
      oneShot(async () =>
        args.tx_hash !== undefined
          ? wallet.signTxHash({ tx_hash: args.tx_hash })
          : wallet.signTxHash({ tx_bytes: args.tx_bytes ?? "" })
      ),
  });

  return [derive, signMessage, signTx];
}
