import fs from "node:fs";
import path from "node:path";
import { z } from "zod";

const FillSchema = z.object({
  ts: z.string(),
  kind: z.literal("FILL"),
  fillId: z.string(),
  network: z.string(),
  inputToken: z.string(), // symbol
  outputToken: z.string(),
  inputAddress: z.string(),
  outputAddress: z.string(),
  amountIn: z.string().regex(/^[0-9]+$/), // base units
  amountOut: z.string().regex(/^[0-9]+$/),
  inputPriceUsd: z.number(),
  outputPriceUsd: z.number(),
  valueUsd: z.number(),
  note: z.string().optional(),
});

const RejectSchema = z.object({
  ts: z.string(),
  kind: z.literal("REJECT"),
  fillId: z.string(),
  network: z.string(),
  note: z.string(),
});

const EntrySchema = z.discriminatedUnion("kind", [FillSchema, RejectSchema]);

export type PaperFill = z.infer<typeof FillSchema>;
export type PaperLedgerEntry = z.infer<typeof EntrySchema>;

/** Append-only JSONL record of simulated fills. */
export class PaperLedger {
  constructor(private readonly filePath: string) {}

  append(entry: PaperLedgerEntry): void {
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });
    fs.appendFileSync(this.filePath, JSON.stringify(entry) + "\n", "utf8");
  }

  /** Every well-formed entry in file order; a torn or foreign line is skipped. */
  readAll(): PaperLedgerEntry[] {
    if (!fs.existsSync(this.filePath)) return [];
    const raw = fs.readFileSync(this.filePath, "utf8").trim();
    if (!raw) return [];

    const out: PaperLedgerEntry[] = [];
    for (const line of raw.split("\n")) {
      let json: unknown;
      try {
        json = JSON.parse(line);
      } catch {
        continue;
      }
      const parsed = EntrySchema.safeParse(json);
      if (parsed.success) out.push(parsed.data);
    }
    return out;
  }
}
