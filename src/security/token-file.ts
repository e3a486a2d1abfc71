import fs from "node:fs";
import path from "node:path";
import { errorMessage } from "../errors.js";
import type { Logger } from "../logger.js";
import type { InvocationGrant, InvocationTokenAuthority } from "./invocation-tokens.js";

const MIN_ROTATE_MS = 500;

/**
 * Keeps a fresh invocation token on disk for a local script host.
 *
 * A new grant is written every half TTL, so the file never holds an expired
 * token. Earlier grants stay valid until their own expiry; an evaluation that
 * read the previous token is not cut off mid-cycle.
 */
export class TokenFile {
  private timer: ReturnType<typeof setInterval> | null = null;

  constructor(
    private readonly authority: InvocationTokenAuthority,
    readonly filePath: string,
    private readonly log: Logger,
    private readonly evaluationId = "local-host"
  ) {}

  get rotateEveryMs(): number {
    return Math.max(Math.floor(this.authority.ttlMs / 2), MIN_ROTATE_MS);
  }

  /** Issues a grant and replaces the file contents with its token. */
  rotate(): InvocationGrant {
    const grant = this.authority.issue(this.evaluationId);
    fs.mkdirSync(path.dirname(this.filePath), { recursive: true });

    // Atomic replace: write beside the target, then rename over it.
    const tmp = `${this.filePath}.${process.pid}.tmp`;
    fs.writeFileSync(tmp, grant.token + "\n", { encoding: "utf8", mode: 0o600 });
    fs.renameSync(tmp, this.filePath);

    const evicted = this.authority.cleanupExpired();
    this.log.debug({ expiresAt: new Date(grant.expiresAt).toISOString(), evicted }, "invocation token rotated");
    return grant;
  }

  start(): InvocationGrant {
    const grant = this.rotate();
    this.timer = setInterval(() => {
      try {
        this.rotate();
      } catch (e) {
        this.log.error({ err: errorMessage(e) }, "invocation token rotation failed");
      }
    }, this.rotateEveryMs);
    this.timer.unref();
    return grant;
  }

  dispose(): void {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }
  }
}
