// src/engine/spend-ledger.ts

/** UTC calendar day, YYYY-MM-DD. */
export function utcDayKey(epochMs: number): string {
  return new Date(epochMs).toISOString().slice(0, 10);
}

export type SpendEntry = {
  callId: string;
  amountUsd: number;
  confirmedAt: number; // epoch ms
};

export type DailySpending = {
  day: string;
  totalUsd: number;
  pendingUsd: number;
  history: readonly SpendEntry[];
};

export type ReserveRequest = {
  callId: string;
  amountUsd: number;
  day: string;
  now: number;
  maxPerTradeUsd: number;
  maxDailyUsd: number;
};

export type ReserveResult =
  | { ok: true; totalUsd: number; pendingUsd: number }
  | { ok: false; limit: "per-trade"; amountUsd: number; maxPerTradeUsd: number }
  | { ok: false; limit: "daily"; totalUsd: number; pendingUsd: number; amountUsd: number; maxDailyUsd: number };

export type ConfirmResult =
  | { state: "confirmed"; day: string; totalUsd: number }
  | { state: "stale-day"; day: string } // confirmed after its reserved day closed; counted on that day
  | { state: "unknown" };

/**
 * Reserve-then-confirm store behind the spend tracker. `reserve` checks both
 * caps against committed plus pending value and holds the amount under the
 * call id; only `confirm` moves it into the day's total.
 */
export interface SpendLedger {
  reserve(req: ReserveRequest): ReserveResult;
  confirm(callId: string, now: number): ConfirmResult;
  release(callId: string): boolean;
  snapshot(day: string): DailySpending;
  close?(): void;
}

type Reservation = { amountUsd: number; day: string; reservedAt: number };

type DayBook = { totalUsd: number; history: SpendEntry[] };

export class MemorySpendLedger implements SpendLedger {
  private day = "";
  // The current day, plus any closed day that still has reservations in flight.
  private readonly books = new Map<string, DayBook>();
  private readonly pending = new Map<string, Reservation>();

  constructor(private readonly historyLimit = 200) {}

  private rollTo(day: string) {
    if (day === this.day) return;
    this.day = day;
    for (const d of [...this.books.keys()]) {
      if (d !== day && this.pendingFor(d) === 0) this.books.delete(d);
    }
  }

  private book(day: string): DayBook {
    let b = this.books.get(day);
    if (!b) {
      b = { totalUsd: 0, history: [] };
      this.books.set(day, b);
    }
    return b;
  }

  private pendingFor(day: string): number {
    let sum = 0;
    for (const r of this.pending.values()) if (r.day === day) sum += r.amountUsd;
    return sum;
  }

  reserve(req: ReserveRequest): ReserveResult {
    this.rollTo(req.day);
    const { totalUsd } = this.book(req.day);

    if (req.amountUsd > req.maxPerTradeUsd) {
      return { ok: false, limit: "per-trade", amountUsd: req.amountUsd, maxPerTradeUsd: req.maxPerTradeUsd };
    }

    const pendingUsd = this.pendingFor(req.day);
    if (totalUsd + pendingUsd + req.amountUsd > req.maxDailyUsd) {
      return {
        ok: false,
        limit: "daily",
        totalUsd,
        pendingUsd,
        amountUsd: req.amountUsd,
        maxDailyUsd: req.maxDailyUsd,
      };
    }

    this.pending.set(req.callId, { amountUsd: req.amountUsd, day: req.day, reservedAt: req.now });
    return { ok: true, totalUsd, pendingUsd: pendingUsd + req.amountUsd };
  }

  confirm(callId: string, now: number): ConfirmResult {
    const r = this.pending.get(callId);
    if (!r) return { state: "unknown" };
    this.pending.delete(callId);

    // Counted toward the day it was reserved on, even once that day has closed.
    const b = this.book(r.day);
    b.totalUsd += r.amountUsd;
    b.history.push({ callId, amountUsd: r.amountUsd, confirmedAt: now });
    if (b.history.length > this.historyLimit) {
      b.history.splice(0, b.history.length - this.historyLimit);
    }

    if (r.day !== utcDayKey(now)) return { state: "stale-day", day: r.day };
    return { state: "confirmed", day: r.day, totalUsd: b.totalUsd };
  }

  release(callId: string): boolean {
    return this.pending.delete(callId);
  }

  snapshot(day: string): DailySpending {
    const b = this.books.get(day);
    return {
      day,
      totalUsd: b?.totalUsd ?? 0,
      pendingUsd: this.pendingFor(day),
      history: b ? b.history.map((e) => ({ ...e })) : [],
    };
  }
}
