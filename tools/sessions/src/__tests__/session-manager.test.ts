import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { AuthError, NotFoundError } from "lanrelay-shared/errors";
import { SessionManager } from "../session-manager.js";

const credentials = { username: "admin", password: "test-secret" };

function clock(start = 1_000_000) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe("SessionManager: login", () => {
  it("issues a 64-character hex token", () => {
    const sessions = new SessionManager({ credentials, ttlMs: 60_000 });
    const session = sessions.login(credentials);
    expect(session.token).toMatch(/^[0-9a-f]{64}$/);
    expect(session.username).toBe("admin");
    expect(sessions.size).toBe(1);
  });

  it("sets expiresAt from the TTL", () => {
    const time = clock();
    const sessions = new SessionManager({ credentials, ttlMs: 60_000, now: time.now });
    const session = sessions.login(credentials);
    expect(session.createdAt.getTime()).toBe(1_000_000);
    expect(session.expiresAt?.getTime()).toBe(1_060_000);
  });

  it("never expires with a TTL of 0", () => {
    const sessions = new SessionManager({ credentials, ttlMs: 0 });
    expect(sessions.login(credentials).expiresAt).toBeNull();
  });

  it("issues a different token on every login", () => {
    const sessions = new SessionManager({ credentials, ttlMs: 60_000 });
    expect(sessions.login(credentials).token).not.toBe(sessions.login(credentials).token);
  });

  it.each([
    ["wrong password", { username: "admin", password: "nope" }],
    ["wrong username", { username: "root", password: "test-secret" }],
    ["empty values", { username: "", password: "" }],
  ])("rejects %s", (_label, attempt) => {
    const sessions = new SessionManager({ credentials, ttlMs: 60_000 });
    expect(() => sessions.login(attempt)).toThrow(AuthError);
    expect(() => sessions.login(attempt)).toThrow("Invalid credentials");
    expect(sessions.size).toBe(0);
  });

  it("is disabled when no password is configured", () => {
    const sessions = new SessionManager({ credentials: { username: "admin", password: undefined }, ttlMs: 60_000 });
    expect(sessions.loginEnabled).toBe(false);
    expect(() => sessions.login({ username: "admin", password: "" })).toThrow("Login is disabled on this relay");
  });
});

describe("SessionManager: verify and logout", () => {
  let time: ReturnType<typeof clock>;
  let sessions: SessionManager;

  beforeEach(() => {
    time = clock();
    sessions = new SessionManager({ credentials, ttlMs: 60_000, now: time.now });
  });

  it("reports valid, unknown and missing tokens", () => {
    const { token } = sessions.login(credentials);
    expect(sessions.verify(token)).toBe("valid");
    expect(sessions.verify("not-a-token")).toBe("unknown");
    expect(sessions.verify(undefined)).toBe("unknown");
    expect(sessions.verify("")).toBe("unknown");
  });

  it("reports expired once, then forgets the session", () => {
    const { token } = sessions.login(credentials);
    time.advance(60_000);
    expect(sessions.verify(token)).toBe("expired");
    expect(sessions.verify(token)).toBe("unknown");
    expect(sessions.size).toBe(0);
  });

  it("keeps a session valid until its expiry instant", () => {
    const { token } = sessions.login(credentials);
    time.advance(59_999);
    expect(sessions.verify(token)).toBe("valid");
  });

  it("logout invalidates the token for good", () => {
    const { token } = sessions.login(credentials);
    sessions.logout(token);
    expect(sessions.verify(token)).toBe("unknown");
    const next = sessions.login(credentials);
    expect(next.token).not.toBe(token);
    expect(sessions.verify(token)).toBe("unknown");
  });

  it("logout of an unknown token throws NotFoundError", () => {
    expect(() => sessions.logout("not-a-token")).toThrow(NotFoundError);
    expect(() => sessions.logout("not-a-token")).toThrow("Session not found");
  });
});

describe("SessionManager: sweeping", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("sweep removes only expired sessions", () => {
    const time = clock();
    const sessions = new SessionManager({ credentials, ttlMs: 60_000, now: time.now });
    sessions.login(credentials);
    time.advance(30_000);
    const fresh = sessions.login(credentials);
    time.advance(30_000);

    expect(sessions.sweep()).toBe(1);
    expect(sessions.size).toBe(1);
    expect(sessions.verify(fresh.token)).toBe("valid");
  });

  it("startSweeper sweeps on an interval", () => {
    vi.useFakeTimers();
    const time = clock();
    const sessions = new SessionManager({ credentials, ttlMs: 1_000, now: time.now });
    sessions.login(credentials);
    time.advance(1_000);

    sessions.startSweeper(500);
    vi.advanceTimersByTime(500);
    expect(sessions.size).toBe(0);
    sessions.close();
  });

  it("close clears every session", () => {
    const sessions = new SessionManager({ credentials, ttlMs: 60_000 });
    const { token } = sessions.login(credentials);
    sessions.startSweeper(1_000);
    sessions.close();
    expect(sessions.size).toBe(0);
    expect(sessions.verify(token)).toBe("unknown");
  });
});
