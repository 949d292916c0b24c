/**
 * Domain records shared by the relay packages.
 *
 * These are plain data: the services that own them (sessions, process, system)
 * hand out frozen copies, and the response taxonomy carries them to the wire.
 */

export type ProcessState = "running" | "killed" | "exited";

export interface ProcessRecord {
  pid: number;
  /** Command line as submitted, e.g. "sleep 5". */
  command: string;
  argv: string[];
  startedAt: Date;
  state: ProcessState;
  exitCode: number | null;
  signal: string | null;
  endedAt: Date | null;
}

export interface LogEntry {
  stream: "stdout" | "stderr";
  line: string;
}

export interface ProgramEntry {
  name: string;
  path: string;
  args: string[];
  description: string;
}

export interface Session {
  token: string;
  username: string;
  createdAt: Date;
  /** null when sessions never expire (TTL of 0). */
  expiresAt: Date | null;
}

export type TokenStatus = "valid" | "expired" | "unknown";

export type HealthStatus = "healthy" | "degraded";

export interface HealthSnapshot {
  name: string;
  status: HealthStatus;
  /** ISO-8601, UTC. */
  lastHealthCheck: string;
}

export interface HostSpecs {
  timestamp: string;
  hostname: string;
  platform: string;
  release: string;
  arch: string;
  cpuModel: string;
  cpuCount: number;
  totalMemoryGb: number;
  uptimeSeconds: number;
}
