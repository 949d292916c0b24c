/**
 * Host facts for the health route and the get_specs endpoint.
 *
 * snapshot() runs every health check on each call; there is no cached status.
 * A check that throws counts as failed.
 */
import * as os from "node:os";
import type { Logger } from "pino";
import type { SystemInfoSource } from "lanrelay-shared/context";
import { formatLocalTimestamp } from "lanrelay-shared/time";
import type { HealthSnapshot, HostSpecs } from "lanrelay-shared/types";

export interface HealthCheck {
  name: string;
  run(): boolean;
}

export interface SystemInfoOptions {
  name: string;
  checks?: readonly HealthCheck[];
  now?: () => Date;
  logger?: Logger;
}

const BYTES_PER_GB = 1024 ** 3;

export class SystemInfoProvider implements SystemInfoSource {
  private readonly name: string;
  private readonly checks: readonly HealthCheck[];
  private readonly now: () => Date;
  private readonly logger: Logger | undefined;

  constructor(options: SystemInfoOptions) {
    this.name = options.name;
    this.checks = options.checks ?? [];
    this.now = options.now ?? (() => new Date());
    this.logger = options.logger?.child({ component: "system" });
  }

  snapshot(): HealthSnapshot {
    const failed = this.checks.filter((check) => !this.passes(check)).map((check) => check.name);
    if (failed.length > 0) {
      this.logger?.warn({ failed }, "health checks failing");
    }
    return {
      name: this.name,
      status: failed.length === 0 ? "healthy" : "degraded",
      lastHealthCheck: this.now().toISOString(),
    };
  }

  specs(): HostSpecs {
    const cpus = os.cpus();
    return {
      timestamp: formatLocalTimestamp(this.now()),
      hostname: os.hostname(),
      platform: os.platform(),
      release: os.release(),
      arch: os.arch(),
      cpuModel: cpus.length > 0 ? cpus[0].model.trim() : "unknown",
      cpuCount: cpus.length,
      totalMemoryGb: Math.round((os.totalmem() / BYTES_PER_GB) * 100) / 100,
      uptimeSeconds: Math.floor(os.uptime()),
    };
  }

  private passes(check: HealthCheck): boolean {
    try {
      return check.run();
    } catch (err: unknown) {
      this.logger?.error({ err, check: check.name }, "health check threw");
      return false;
    }
  }
}
