/**
 * pino logger for the relay. JSON lines in production, pino-pretty when
 * NODE_ENV=development. Components take child loggers:
 *   const log = logger.child({ component: "executor" });
 */
import pino, { type Logger } from "pino";
import type { LogLevel } from "./config.js";

export interface LoggerOptions {
  level?: LogLevel;
  pretty?: boolean;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  return pino({
    level: options.level ?? "info",
    transport: options.pretty
      ? {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss",
            ignore: "pid,hostname",
          },
        }
      : undefined,
  });
}

/** Logger that drops everything. Tests and embedded use. */
export function silentLogger(): Logger {
  return pino({ level: "silent" });
}
