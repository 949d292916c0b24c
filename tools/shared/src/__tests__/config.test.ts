import { describe, it, expect } from "vitest";
import * as os from "node:os";
import * as path from "node:path";
import { DEFAULT_ENDPOINTS_DIR, loadConfig } from "../config.js";
import { ConfigurationError } from "../errors.js";

describe("loadConfig", () => {
  it("applies defaults for an empty environment", () => {
    const config = loadConfig({});
    expect(config.name).toBe(os.hostname());
    expect(config.host).toBe("0.0.0.0");
    expect(config.port).toBe(5000);
    expect(config.endpointsDir).toBe(DEFAULT_ENDPOINTS_DIR);
    expect(config.auth).toEqual({ username: "admin", password: undefined });
    expect(config.sessionTtlMs).toBe(3_600_000);
    expect(config.sessionSweepMs).toBe(60_000);
    expect(config.corsOrigins).toEqual(["http://localhost", "http://127.0.0.1"]);
    expect(config.processHistory).toBe(50);
    expect(config.logLevel).toBe("info");
    expect(config.pretty).toBe(false);
  });

  it("endpoint tree default points at the server package", () => {
    expect(DEFAULT_ENDPOINTS_DIR.endsWith(path.join("tools", "server", "src", "endpoints"))).toBe(true);
  });

  it("coerces numeric variables", () => {
    const config = loadConfig({ RELAY_PORT: "8080", RELAY_SESSION_TTL_SECONDS: "0", RELAY_PROCESS_HISTORY: "5" });
    expect(config.port).toBe(8080);
    expect(config.sessionTtlMs).toBe(0);
    expect(config.processHistory).toBe(5);
  });

  it("treats blank values as unset", () => {
    const config = loadConfig({ RELAY_PASSWORD: "   ", RELAY_PORT: "" });
    expect(config.auth.password).toBeUndefined();
    expect(config.port).toBe(5000);
  });

  it("splits and trims CORS origins", () => {
    const config = loadConfig({ RELAY_CORS_ORIGINS: " http://10.0.0.5 , ,http://controller.lan" });
    expect(config.corsOrigins).toEqual(["http://10.0.0.5", "http://controller.lan"]);
  });

  it("enables pretty logs in development", () => {
    expect(loadConfig({ NODE_ENV: "development" }).pretty).toBe(true);
  });

  it("lists every invalid variable", () => {
    expect(() => loadConfig({ RELAY_PORT: "99999", LOG_LEVEL: "loud" })).toThrow(ConfigurationError);
    try {
      loadConfig({ RELAY_PORT: "99999", LOG_LEVEL: "loud" });
    } catch (err) {
      expect(err).toBeInstanceOf(ConfigurationError);
      if (!(err instanceof ConfigurationError)) return;
      expect(err.problems.map((p) => p.split(":")[0])).toEqual(["RELAY_PORT", "LOG_LEVEL"]);
    }
  });
});
