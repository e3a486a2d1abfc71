import Database from "better-sqlite3";
import fs from "node:fs";
import path from "node:path";
import {
  utcDayKey,
  type ConfirmResult,
  type DailySpending,
  type ReserveRequest,
  type ReserveResult,
  type SpendEntry,
  type SpendLedger,
} from "./spend-ledger.js";

type EntryRow = {
  call_id: string;
  day: string;
  amount_usd: number;
  state: "pending" | "confirmed";
  reserved_at_ms: number;
  confirmed_at_ms: number | null;
};

type SumRow = { total: number | null };

export type SqliteSpendLedgerOptions = {
  filePath: string;
  historyLimit?: number;
  // Pending rows older than this belong to a process that died mid-call.
  staleReservationMs?: number;
};

export function openLedgerDb(filePath: string): Database.Database {
  if (filePath !== ":memory:") fs.mkdirSync(path.dirname(filePath), { recursive: true });

  const db = new Database(filePath);
  db.pragma("journal_mode = WAL");
  db.pragma("synchronous = FULL");
  db.pragma("busy_timeout = 5000");
  db.pragma("temp_store = FILE");

  db.exec(`
    CREATE TABLE IF NOT EXISTS spend_entries (
      call_id TEXT PRIMARY KEY,
      day TEXT NOT NULL,
      amount_usd REAL NOT NULL,
      state TEXT NOT NULL CHECK (state IN ('pending', 'confirmed')),
      reserved_at_ms INTEGER NOT NULL,
      confirmed_at_ms INTEGER
    );

    CREATE INDEX IF NOT EXISTS idx_spend_day_state
      ON spend_entries(day, state);
  `);
  return db;
}

/**
 * Durable ledger: a restart inside a UTC day keeps that day's committed total.
 * Every check-and-reserve runs under BEGIN IMMEDIATE, so processes sharing
 * the file serialize on it.
 */
export class SqliteSpendLedger implements SpendLedger {
  private readonly db: Database.Database;
  private readonly historyLimit: number;
  private readonly staleReservationMs: number;

  constructor(opts: SqliteSpendLedgerOptions) {
    this.db = openLedgerDb(opts.filePath);
    this.historyLimit = opts.historyLimit ?? 200;
    this.staleReservationMs = opts.staleReservationMs ?? 10 * 60_000;
  }

  private sum(day: string, state: EntryRow["state"]): number {
    const row = this.db
      .prepare<[string, string], SumRow>(
        `SELECT SUM(amount_usd) AS total FROM spend_entries WHERE day = ? AND state = ?`
      )
      .get(day, state);
    return row?.total ?? 0;
  }

  reserve(req: ReserveRequest): ReserveResult {
    const run = this.db.transaction((r: ReserveRequest): ReserveResult => {
      this.db
        .prepare(`DELETE FROM spend_entries WHERE state = 'pending' AND reserved_at_ms < ?`)
        .run(r.now - this.staleReservationMs);

      if (r.amountUsd > r.maxPerTradeUsd) {
        return { ok: false, limit: "per-trade", amountUsd: r.amountUsd, maxPerTradeUsd: r.maxPerTradeUsd };
      }

      const totalUsd = this.sum(r.day, "confirmed");
      const pendingUsd = this.sum(r.day, "pending");
      if (totalUsd + pendingUsd + r.amountUsd > r.maxDailyUsd) {
        return { ok: false, limit: "daily", totalUsd, pendingUsd, amountUsd: r.amountUsd, maxDailyUsd: r.maxDailyUsd };
      }

      this.db
        .prepare(
          `INSERT INTO spend_entries (call_id, day, amount_usd, state, reserved_at_ms, confirmed_at_ms)
           VALUES (?, ?, ?, 'pending', ?, NULL)`
        )
        .run(r.callId, r.day, r.amountUsd, r.now);

      return { ok: true, totalUsd, pendingUsd: pendingUsd + r.amountUsd };
    });

    return run.immediate(req);
  }

  confirm(callId: string, now: number): ConfirmResult {
    const run = this.db.transaction((id: string, at: number): ConfirmResult => {
      const row = this.db
        .prepare<[string], EntryRow>(`SELECT * FROM spend_entries WHERE call_id = ? AND state = 'pending'`)
        .get(id);
      if (!row) return { state: "unknown" };

      this.db
        .prepare(`UPDATE spend_entries SET state = 'confirmed', confirmed_at_ms = ? WHERE call_id = ?`)
        .run(at, id);

      // Still counted toward the day it was reserved on.
      if (row.day !== utcDayKey(at)) return { state: "stale-day", day: row.day };
      return { state: "confirmed", day: row.day, totalUsd: this.sum(row.day, "confirmed") };
    });

    return run.immediate(callId, now);
  }

  release(callId: string): boolean {
    const info = this.db
      .prepare(`DELETE FROM spend_entries WHERE call_id = ? AND state = 'pending'`)
      .run(callId);
    return info.changes > 0;
  }

  snapshot(day: string): DailySpending {
    const rows = this.db
      .prepare<[string, number], EntryRow>(
        `SELECT * FROM spend_entries
         WHERE day = ? AND state = 'confirmed'
         ORDER BY confirmed_at_ms DESC
         LIMIT ?`
      )
      .all(day, this.historyLimit);

    const history: SpendEntry[] = rows.reverse().map((r) => ({
      callId: r.call_id,
      amountUsd: r.amount_usd,
      confirmedAt: r.confirmed_at_ms ?? r.reserved_at_ms,
    }));

    return {
      day,
      totalUsd: this.sum(day, "confirmed"),
      pendingUsd: this.sum(day, "pending"),
      history,
    };
  }

  close(): void {
    this.db.close();
  }
}
