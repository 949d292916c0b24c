/**
 * RemoteContext: the process-wide state handed to dispatch() and to every
 * handler. Built once at server start (see lanrelay-server/server) and torn
 * down at shutdown; nothing in here is reached through module globals.
 *
 * Services are typed by the slice of their API that handlers use, so tests
 * can pass fakes and the owning packages stay free to grow.
 *
 * Usage (in a handler):
 *   async function handler(args: Args, ctx: RemoteContext) {
 *     const record = ctx.executor.execute(args.command, args.args);
 *     return processInfo([record], "Process started");
 *   }
 */
import type { Logger } from "pino";
import type { RelayConfig } from "./config.js";
import type { EndpointRegistry } from "./registry.js";
import type {
  HealthSnapshot,
  HostSpecs,
  LogEntry,
  ProcessRecord,
  Session,
  TokenStatus,
} from "./types.js";

export interface Credentials {
  username: string;
  password: string;
}

export interface SessionStore {
  login(credentials: Credentials): Session;
  logout(token: string): void;
  verify(token: string | undefined): TokenStatus;
}

export interface ExecuteConstraints {
  cwd?: string;
  env?: Record<string, string>;
  /** Kill the process when it runs longer than this. */
  timeoutMs?: number;
}

export interface ProcessExecutor {
  execute(command: string, args?: readonly string[], constraints?: ExecuteConstraints): ProcessRecord;
  kill(pid: number, signal?: NodeJS.Signals): void;
  list(): readonly ProcessRecord[];
  output(pid: number): readonly LogEntry[];
}

export interface SystemInfoSource {
  snapshot(): HealthSnapshot;
  specs(): HostSpecs;
}

export interface RemoteContext {
  config: RelayConfig;
  logger: Logger;
  registry: EndpointRegistry;
  sessions: SessionStore;
  executor: ProcessExecutor;
  system: SystemInfoSource;
}
