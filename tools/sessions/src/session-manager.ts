/**
 * In-memory session table for the relay.
 *
 * login() issues a bearer token, verify() gates requiresAuth endpoints and
 * logout() revokes a token. Tokens are never reissued: a revoked or expired
 * token stays dead, and the next login gets a fresh one.
 *
 * Every method is synchronous, so a read and the write that depends on it can
 * never interleave with another request.
 *
 * Sessions live only as long as the process.
 */
import { createHash, randomBytes, timingSafeEqual } from "node:crypto";
import type { Logger } from "pino";
import type { Credentials, SessionStore } from "lanrelay-shared/context";
import { AuthError, NotFoundError } from "lanrelay-shared/errors";
import type { Session, TokenStatus } from "lanrelay-shared/types";

export interface SessionManagerOptions {
  credentials: {
    username: string;
    /** undefined disables login. */
    password: string | undefined;
  };
  /** 0 means sessions never expire. */
  ttlMs: number;
  now?: () => number;
  logger?: Logger;
}

const TOKEN_BYTES = 32;

function digest(value: string): Buffer {
  return createHash("sha256").update(value, "utf8").digest();
}

/** Compare through fixed-length digests so timing does not leak the length. */
function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export class SessionManager implements SessionStore {
  private readonly sessions = new Map<string, Session>();
  private readonly username: string;
  private readonly password: string | undefined;
  private readonly ttlMs: number;
  private readonly now: () => number;
  private readonly logger: Logger | undefined;
  private sweeper: NodeJS.Timeout | undefined;

  constructor(options: SessionManagerOptions) {
    this.username = options.credentials.username;
    this.password = options.credentials.password;
    this.ttlMs = options.ttlMs;
    this.now = options.now ?? Date.now;
    this.logger = options.logger?.child({ component: "sessions" });
  }

  get size(): number {
    return this.sessions.size;
  }

  get loginEnabled(): boolean {
    return this.password !== undefined;
  }

  login(credentials: Credentials): Session {
    if (this.password === undefined) {
      throw new AuthError("Login is disabled on this relay");
    }

    // Both comparisons always run
    const userOk = safeEqual(credentials.username, this.username);
    const passOk = safeEqual(credentials.password, this.password);
    if (!userOk || !passOk) {
      this.logger?.warn({ username: credentials.username }, "login rejected");
      throw new AuthError("Invalid credentials");
    }

    const created = this.now();
    const session: Session = Object.freeze({
      token: randomBytes(TOKEN_BYTES).toString("hex"),
      username: this.username,
      createdAt: new Date(created),
      expiresAt: this.ttlMs > 0 ? new Date(created + this.ttlMs) : null,
    });
    this.sessions.set(session.token, session);
    this.logger?.info({ username: session.username }, "session opened");
    return session;
  }

  logout(token: string): void {
    if (!this.sessions.delete(token)) {
      throw new NotFoundError("Session");
    }
    this.logger?.info("session closed");
  }

  verify(token: string | undefined): TokenStatus {
    if (token === undefined || token === "") return "unknown";

    const session = this.sessions.get(token);
    if (!session) return "unknown";

    if (this.isExpired(session)) {
      this.sessions.delete(token);
      return "expired";
    }
    return "valid";
  }

  /** Drop every expired session. Returns how many went. */
  sweep(): number {
    let removed = 0;
    for (const [token, session] of this.sessions) {
      if (this.isExpired(session)) {
        this.sessions.delete(token);
        removed++;
      }
    }
    if (removed > 0) {
      this.logger?.debug({ removed }, "expired sessions swept");
    }
    return removed;
  }

  startSweeper(intervalMs: number): void {
    this.stopSweeper();
    this.sweeper = setInterval(() => this.sweep(), intervalMs);
    this.sweeper.unref();
  }

  stopSweeper(): void {
    if (this.sweeper) {
      clearInterval(this.sweeper);
      this.sweeper = undefined;
    }
  }

  /** Stop sweeping and forget every session. */
  close(): void {
    this.stopSweeper();
    this.sessions.clear();
  }

  private isExpired(session: Session): boolean {
    return session.expiresAt !== null && this.now() >= session.expiresAt.getTime();
  }
}
