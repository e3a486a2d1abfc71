// src/security/invocation-tokens.ts
import * as crypto from "node:crypto";

export type InvocationGrant = {
  token: string;
  evaluationId: string;
  issuedAt: number; // epoch ms
  expiresAt: number; // epoch ms
};

export type TokenCheck =
  | { ok: true; grant: InvocationGrant }
  | { ok: false; reason: "missing" | "unknown" | "expired" };

const MIN_TTL_MS = 1_000;
const MAX_TTL_MS = 60 * 60 * 1000;

/**
 * Issues the opaque credentials a script evaluation presents on every tool
 * call. Expired grants are evicted on access.
 */
export class InvocationTokenAuthority {
  private readonly store = new Map<string, InvocationGrant>();
  readonly ttlMs: number;
  private readonly now: () => number;

  constructor(opts: { ttlMs: number; now?: () => number }) {
    const t = Number.isFinite(opts.ttlMs) ? opts.ttlMs : 300_000;
    this.ttlMs = Math.min(Math.max(t, MIN_TTL_MS), MAX_TTL_MS);
    this.now = opts.now ?? Date.now;
  }

  issue(evaluationId: string): InvocationGrant {
    const issuedAt = this.now();
    const grant: InvocationGrant = {
      token: crypto.randomBytes(32).toString("base64url"),
      evaluationId,
      issuedAt,
      expiresAt: issuedAt + this.ttlMs,
    };
    this.store.set(grant.token, grant);
    return grant;
  }

  validate(token: unknown): TokenCheck {
    if (typeof token !== "string" || token.length === 0) return { ok: false, reason: "missing" };

    const grant = this.store.get(token);
    if (!grant) return { ok: false, reason: "unknown" };

    if (this.now() > grant.expiresAt) {
      this.store.delete(token);
      return { ok: false, reason: "expired" };
    }
    return { ok: true, grant };
  }

  revoke(token: string): boolean {
    return this.store.delete(token);
  }

  /** Ends every grant of a cancelled or finished evaluation. */
  revokeEvaluation(evaluationId: string): number {
    let n = 0;
    for (const [k, v] of this.store) {
      if (v.evaluationId === evaluationId) {
        this.store.delete(k);
        n++;
      }
    }
    return n;
  }

  cleanupExpired(): number {
    const t = this.now();
    let n = 0;
    for (const [k, v] of this.store) {
      if (t > v.expiresAt) {
        this.store.delete(k);
        n++;
      }
    }
    return n;
  }
}
