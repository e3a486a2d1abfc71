import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtempSync, readFileSync, rmSync, statSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { silentLogger } from "../../src/logger.js";
import { InvocationTokenAuthority } from "../../src/security/invocation-tokens.js";
import { TokenFile } from "../../src/security/token-file.js";
import { FakeClock } from "../helpers/fixtures.js";

describe("TokenFile", () => {
  let dir: string;
  let filePath: string;
  let clock: FakeClock;
  let authority: InvocationTokenAuthority;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "token-file-"));
    filePath = join(dir, "state", "invocation-token");
    clock = new FakeClock(1_000_000);
    authority = new InvocationTokenAuthority({ ttlMs: 10_000, now: clock.now });
  });

  afterEach(() => {
    vi.useRealTimers();
    rmSync(dir, { recursive: true, force: true });
  });

  const onDisk = () => readFileSync(filePath, "utf8").trim();

  it("writes a valid token readable only by its owner", () => {
    const grant = new TokenFile(authority, filePath, silentLogger()).rotate();

    expect(onDisk()).toBe(grant.token);
    expect(statSync(filePath).mode & 0o777).toBe(0o600);
    expect(authority.validate(grant.token)).toMatchObject({ ok: true, grant: { evaluationId: "local-host" } });
  });

  it("rotates every half TTL", () => {
    expect(new TokenFile(authority, filePath, silentLogger()).rotateEveryMs).toBe(5_000);
  });

  it("keeps the previous token valid until it expires", () => {
    const file = new TokenFile(authority, filePath, silentLogger());
    const first = file.rotate();

    clock.advance(5_000);
    const second = file.rotate();
    expect(onDisk()).toBe(second.token);
    expect(authority.validate(first.token).ok).toBe(true);

    clock.advance(6_000);
    file.rotate();
    expect(authority.validate(first.token)).toEqual({ ok: false, reason: "unknown" });
    expect(authority.validate(second.token).ok).toBe(true);
  });

  it("never leaves an expired token on disk while running", () => {
    vi.useFakeTimers();
    const file = new TokenFile(authority, filePath, silentLogger());
    const initial = file.start();

    for (let i = 0; i < 6; i++) {
      clock.advance(file.rotateEveryMs);
      vi.advanceTimersByTime(file.rotateEveryMs);
      expect(authority.validate(onDisk()).ok).toBe(true);
    }
    expect(onDisk()).not.toBe(initial.token);
    expect(authority.validate(initial.token)).toEqual({ ok: false, reason: "unknown" });

    file.dispose();
    const last = onDisk();
    vi.advanceTimersByTime(file.rotateEveryMs * 3);
    expect(onDisk()).toBe(last);
  });
});
