import { inspect } from "node:util";
import { hashMessage, isHex, keccak256, type Address, type Hex, type PrivateKeyAccount } from "viem";
import { privateKeyToAccount } from "viem/accounts";
import { FatalConfiguration } from "../errors.js";
import { Mutex } from "../utils/mutex.js";

export const MAX_MESSAGE_CHARS = 8_000;
export const MAX_TX_BYTES_CHARS = 2 + 2 * 128 * 1024; // 128 KiB of calldata

/**
 * Signing failures. Messages are fixed strings and no cause is attached:
 * nothing that reached the key path is echoed back.
 */
export class WalletError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "WalletError";
  }
}

export type DerivedAddress = { address: Address };

export type SignedMessage = {
  address: Address;
  message_hash: Hex;
  signature: Hex;
};

export type TxHashInput = { tx_hash: string; tx_bytes?: undefined } | { tx_bytes: string; tx_hash?: undefined };

export type SignedTxHash = {
  address: Address;
  hash: Hex;
  hash_source: "tx_hash" | "tx_bytes";
  signature: Hex;
};

const HEX_32 = /^0x[0-9a-fA-F]{64}$/;
const HEX_BYTES = /^0x(?:[0-9a-fA-F]{2})+$/;

function assertMessage(message: unknown): asserts message is string {
  if (typeof message !== "string") throw new WalletError("message must be a string");
  if (message.length === 0) throw new WalletError("message must not be empty");
  if (message.length > MAX_MESSAGE_CHARS) throw new WalletError(`message too long (max ${MAX_MESSAGE_CHARS} chars)`);
}

/** Exactly one of tx_hash / tx_bytes, well formed, before the key is used. */
function resolveTxHash(input: unknown): { hash: Hex; source: SignedTxHash["hash_source"] } {
  if (typeof input !== "object" || input === null) throw new WalletError("expected { tx_hash } or { tx_bytes }");

  const txHash: unknown = Reflect.get(input, "tx_hash");
  const txBytes: unknown = Reflect.get(input, "tx_bytes");
  const hasHash = txHash !== undefined;
  const hasBytes = txBytes !== undefined;

  if (hasHash === hasBytes) throw new WalletError("provide exactly one of tx_hash or tx_bytes");

  if (hasHash) {
    if (typeof txHash !== "string" || !HEX_32.test(txHash) || !isHex(txHash)) {
      throw new WalletError("tx_hash must be 0x-prefixed 32-byte hex");
    }
    return { hash: lowerHex(txHash), source: "tx_hash" };
  }

  if (typeof txBytes !== "string" || !HEX_BYTES.test(txBytes) || !isHex(txBytes)) {
    throw new WalletError("tx_bytes must be 0x-prefixed, non-empty, even-length hex");
  }
  if (txBytes.length > MAX_TX_BYTES_CHARS) throw new WalletError("tx_bytes too long");
  return { hash: keccak256(txBytes), source: "tx_bytes" };
}

function lowerHex(h: Hex): Hex {
  return `0x${h.slice(2).toLowerCase()}`;
}

/**
 * Sole holder of key material. The account lives in a private field and
 * every textual representation of the wallet is redacted.
 */
export class SecureWallet {
  readonly #account: PrivateKeyAccount;
  readonly #signLock = new Mutex();

  private constructor(account: PrivateKeyAccount) {
    this.#account = account;
  }

  /** Accepts 64 hex chars with or without 0x. */
  static fromHex(secret: string): SecureWallet {
    const body = secret.trim().replace(/^0x/i, "");
    if (!/^[0-9a-fA-F]{64}$/.test(body)) {
      throw new WalletError("private key must be 32 bytes of hex");
    }
    try {
      return new SecureWallet(privateKeyToAccount(`0x${body}`));
    } catch {
      // e.g. zero or out-of-range scalar; the library message may quote the input
      throw new WalletError("private key is not a valid secp256k1 scalar");
    }
  }

  get address(): Address {
    return this.#account.address;
  }

  deriveAddress(): DerivedAddress {
    return { address: this.#account.address };
  }

  /** EIP-191 personal message: "\x19Ethereum Signed Message:\n" + len + message, keccak256. */
  async signMessage(message: string): Promise<SignedMessage> {
    assertMessage(message);
    const messageHash = hashMessage(message);
    const signature = await this.signHash(messageHash);
    return { address: this.#account.address, message_hash: messageHash, signature };
  }

  /** Raw bytes are hashed with keccak256 first; a precomputed hash is signed as is. */
  async signTxHash(input: TxHashInput): Promise<SignedTxHash> {
    const { hash, source } = resolveTxHash(input);
    const signature = await this.signHash(hash);
    return { address: this.#account.address, hash, hash_source: source, signature };
  }

  private signHash(hash: Hex): Promise<Hex> {
    return this.#signLock.runExclusive(async () => {
      try {
        return await this.#account.sign({ hash });
      } catch {
        throw new WalletError("signing failed");
      }
    });
  }

  toJSON(): Record<string, string> {
    return { address: this.#account.address, key: "[REDACTED]" };
  }

  toString(): string {
    return `SecureWallet(${this.#account.address}, key=[REDACTED])`;
  }

  [inspect.custom](): string {
    return this.toString();
  }
}

/**
 * Reads WALLET_PRIVATE_KEY once at startup. Errors never include the value.
 */
export function loadWalletFromEnv(env: NodeJS.ProcessEnv = process.env): SecureWallet {
  const raw = (env.WALLET_PRIVATE_KEY ?? "").trim();
  if (!raw) throw new FatalConfiguration("WALLET_PRIVATE_KEY missing");
  try {
    return SecureWallet.fromHex(raw);
  } catch (e) {
    const reason = e instanceof WalletError ? e.message : "unreadable";
    throw new FatalConfiguration(`WALLET_PRIVATE_KEY invalid: ${reason}`);
  }
}
