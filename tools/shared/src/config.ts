/**
 * Relay configuration, read from the environment once at startup.
 *
 * The entry point loads `.env` (dotenv) before calling loadConfig(). Empty
 * values count as unset, so `RELAY_PASSWORD=` leaves login disabled rather
 * than failing validation.
 */
import * as os from "node:os";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { z } from "zod/v4";
import { ConfigurationError } from "./errors.js";

const TOOLS_DIR = path.resolve(path.dirname(fileURLToPath(import.meta.url)), "../..");

export const DEFAULT_ENDPOINTS_DIR = path.join(TOOLS_DIR, "server", "src", "endpoints");
export const DEFAULT_PROGRAMS_FILE = path.join(TOOLS_DIR, "server", "config", "programs.json");

export const LOG_LEVELS = ["fatal", "error", "warn", "info", "debug", "trace", "silent"] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export const relayEnvSchema = z.object({
  RELAY_NAME: z.string().default(os.hostname()),
  RELAY_HOST: z.string().default("0.0.0.0"),
  RELAY_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  RELAY_ENDPOINTS_DIR: z.string().default(DEFAULT_ENDPOINTS_DIR),
  RELAY_USERNAME: z.string().default("admin"),
  RELAY_PASSWORD: z.string().optional(),
  /** 0 disables expiry. */
  RELAY_SESSION_TTL_SECONDS: z.coerce.number().int().min(0).default(3600),
  RELAY_SESSION_SWEEP_SECONDS: z.coerce.number().int().positive().default(60),
  /** Comma-separated origins; each matches on any port. */
  RELAY_CORS_ORIGINS: z.string().default("http://localhost,http://127.0.0.1"),
  RELAY_PROGRAMS_FILE: z.string().default(DEFAULT_PROGRAMS_FILE),
  RELAY_PROCESS_HISTORY: z.coerce.number().int().min(0).default(50),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
  NODE_ENV: z.string().default("production"),
});

export interface RelayConfig {
  name: string;
  host: string;
  port: number;
  endpointsDir: string;
  auth: {
    username: string;
    /** undefined disables login. */
    password: string | undefined;
  };
  sessionTtlMs: number;
  sessionSweepMs: number;
  corsOrigins: string[];
  programsFile: string;
  processHistory: number;
  logLevel: LogLevel;
  /** Pretty-print logs (development only). */
  pretty: boolean;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): RelayConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value.trim() !== "") present[key] = value.trim();
  }

  const parsed = relayEnvSchema.safeParse(present);
  if (!parsed.success) {
    const problems = parsed.error.issues.map((i) => `${i.path.map(String).join(".")}: ${i.message}`);
    throw new ConfigurationError("Invalid relay configuration", problems);
  }

  const vars = parsed.data;
  return {
    name: vars.RELAY_NAME,
    host: vars.RELAY_HOST,
    port: vars.RELAY_PORT,
    endpointsDir: path.resolve(vars.RELAY_ENDPOINTS_DIR),
    auth: { username: vars.RELAY_USERNAME, password: vars.RELAY_PASSWORD },
    sessionTtlMs: vars.RELAY_SESSION_TTL_SECONDS * 1000,
    sessionSweepMs: vars.RELAY_SESSION_SWEEP_SECONDS * 1000,
    corsOrigins: vars.RELAY_CORS_ORIGINS.split(",")
      .map((o) => o.trim())
      .filter((o) => o.length > 0),
    programsFile: path.resolve(vars.RELAY_PROGRAMS_FILE),
    processHistory: vars.RELAY_PROCESS_HISTORY,
    logLevel: vars.LOG_LEVEL,
    pretty: vars.NODE_ENV === "development",
  };
}
