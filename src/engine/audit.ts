import fs from "node:fs";
import path from "node:path";
import type { ErrorKind } from "../errors.js";
import type { ActionKind } from "./types.js";

export type AuditDecision = "allow" | "block" | "error" | "abandoned";

export type AuditContext = {
  actionKind: ActionKind;
  network: string;
  args: Record<string, unknown>;
  tradeValueUsd?: number;
  priceImpactPercent?: number;
  slippagePercent?: number;
  symbol?: string;
};

export type AuditRecord = {
  ts: string;
  callId: string;
  tool: string;
  decision: AuditDecision;
  stage?: string;
  ruleId?: string;
  reason?: string;
  errorKind?: ErrorKind;
  durationMs: number;
  context: AuditContext;
};

/** Append-only. One record per authenticated call attempt. */
export interface AuditSink {
  append(record: AuditRecord): void;
}

export const REDACTED = "[REDACTED]";

export function redactArgs(
  args: Readonly<Record<string, unknown>>,
  sensitive: readonly string[]
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(args)) out[k] = sensitive.includes(k) ? REDACTED : v;
  return out;
}

export class JsonlAuditSink implements AuditSink {
  constructor(private readonly filePath: string) {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
  }

  append(record: AuditRecord): void {
    fs.appendFileSync(this.filePath, JSON.stringify(record) + "\n", { encoding: "utf8" });
  }

  read(limit = 200): AuditRecord[] {
    if (!fs.existsSync(this.filePath)) return [];
    const raw = fs.readFileSync(this.filePath, "utf8").trim();
    if (!raw) return [];
    return raw
      .split("\n")
      .slice(-limit)
      .map((line): AuditRecord => JSON.parse(line));
  }
}

export class MemoryAuditSink implements AuditSink {
  private readonly rows: AuditRecord[] = [];

  append(record: AuditRecord): void {
    this.rows.push(Object.freeze({ ...record }));
  }

  get records(): readonly AuditRecord[] {
    return this.rows;
  }
}
