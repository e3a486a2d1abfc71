import { describe, it, expect } from "vitest";
import { InvocationTokenAuthority } from "../../src/security/invocation-tokens.js";
import { FakeClock } from "../helpers/fixtures.js";

describe("InvocationTokenAuthority", () => {
  it("issues opaque tokens that validate back to their evaluation", () => {
    const authority = new InvocationTokenAuthority({ ttlMs: 60_000 });
    const grant = authority.issue("eval-7");

    expect(grant.token).toMatch(/^[A-Za-z0-9_-]{43}$/);
    const check = authority.validate(grant.token);
    expect(check.ok).toBe(true);
    if (!check.ok) return;
    expect(check.grant.evaluationId).toBe("eval-7");
  });

  it("distinguishes missing from unknown tokens", () => {
    const authority = new InvocationTokenAuthority({ ttlMs: 60_000 });
    expect(authority.validate(undefined)).toEqual({ ok: false, reason: "missing" });
    expect(authority.validate("")).toEqual({ ok: false, reason: "missing" });
    expect(authority.validate(42)).toEqual({ ok: false, reason: "missing" });
    expect(authority.validate("not-a-token")).toEqual({ ok: false, reason: "unknown" });
  });

  it("expires tokens after their TTL and evicts them", () => {
    const clock = new FakeClock(1_000_000);
    const authority = new InvocationTokenAuthority({ ttlMs: 5_000, now: clock.now });
    const { token } = authority.issue("eval-1");

    clock.advance(5_000);
    expect(authority.validate(token).ok).toBe(true);

    clock.advance(1);
    expect(authority.validate(token)).toEqual({ ok: false, reason: "expired" });
    expect(authority.validate(token)).toEqual({ ok: false, reason: "unknown" });
  });

  it("clamps the TTL to at least one second", () => {
    const authority = new InvocationTokenAuthority({ ttlMs: 10, now: () => 0 });
    expect(authority.issue("eval-1").expiresAt).toBe(1_000);
  });

  it("revokes every grant of an evaluation", () => {
    const authority = new InvocationTokenAuthority({ ttlMs: 60_000 });
    const a = authority.issue("eval-1");
    const b = authority.issue("eval-1");
    const other = authority.issue("eval-2");

    expect(authority.revokeEvaluation("eval-1")).toBe(2);
    expect(authority.validate(a.token).ok).toBe(false);
    expect(authority.validate(b.token).ok).toBe(false);
    expect(authority.validate(other.token).ok).toBe(true);
  });

  it("drops expired grants in bulk", () => {
    const clock = new FakeClock(0);
    const authority = new InvocationTokenAuthority({ ttlMs: 2_000, now: clock.now });
    authority.issue("eval-1");
    clock.advance(1_500);
    authority.issue("eval-2");

    clock.advance(1_000);
    expect(authority.cleanupExpired()).toBe(1);
  });
});
