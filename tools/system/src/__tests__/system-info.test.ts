import { describe, it, expect } from "vitest";
import * as os from "node:os";
import { formatLocalTimestamp } from "lanrelay-shared/time";
import { SystemInfoProvider } from "../system-info.js";

const fixedNow = () => new Date(2026, 2, 7, 9, 5, 3);

describe("formatLocalTimestamp", () => {
  it("zero-pads every component", () => {
    expect(formatLocalTimestamp(fixedNow())).toBe("2026-03-07 09:05:03");
  });
});

describe("SystemInfoProvider.snapshot", () => {
  it("is healthy with no checks", () => {
    const system = new SystemInfoProvider({ name: "relay-1", now: fixedNow });
    expect(system.snapshot()).toEqual({
      name: "relay-1",
      status: "healthy",
      lastHealthCheck: fixedNow().toISOString(),
    });
  });

  it("stamps the check time as ISO-8601 UTC", () => {
    const system = new SystemInfoProvider({ name: "relay-1", now: () => new Date(Date.UTC(2026, 2, 7, 9, 5, 3)) });
    expect(system.snapshot().lastHealthCheck).toBe("2026-03-07T09:05:03.000Z");
  });

  it("is degraded when any check fails", () => {
    const system = new SystemInfoProvider({
      name: "relay-1",
      checks: [
        { name: "endpoints", run: () => true },
        { name: "disk", run: () => false },
      ],
    });
    expect(system.snapshot().status).toBe("degraded");
  });

  it("treats a throwing check as failed", () => {
    const system = new SystemInfoProvider({
      name: "relay-1",
      checks: [
        {
          name: "broken",
          run: () => {
            throw new Error("probe failed");
          },
        },
      ],
    });
    expect(system.snapshot().status).toBe("degraded");
  });

  it("re-evaluates checks on every call", () => {
    let up = false;
    const system = new SystemInfoProvider({ name: "relay-1", checks: [{ name: "flag", run: () => up }] });
    expect(system.snapshot().status).toBe("degraded");
    up = true;
    expect(system.snapshot().status).toBe("healthy");
  });
});

describe("SystemInfoProvider.specs", () => {
  it("reports the host's facts", () => {
    const specs = new SystemInfoProvider({ name: "relay-1", now: fixedNow }).specs();
    expect(specs.timestamp).toBe("2026-03-07 09:05:03");
    expect(specs.hostname).toBe(os.hostname());
    expect(specs.platform).toBe(os.platform());
    expect(specs.arch).toBe(os.arch());
    expect(specs.cpuCount).toBe(os.cpus().length);
    expect(specs.totalMemoryGb).toBeGreaterThan(0);
    expect(Number.isInteger(specs.uptimeSeconds)).toBe(true);
  });
});
