/**
 * CLI entry point for the relay.
 *
 * Usage: npx tsx tools/server/src/main.ts [--port 5000] [--host 0.0.0.0] [--endpoints <dir>]
 *
 * Environment (and .env) supplies the rest; flags override RELAY_PORT,
 * RELAY_HOST and RELAY_ENDPOINTS_DIR. SIGHUP rescans the endpoint tree.
 */
import "dotenv/config";
import { loadConfig, type RelayConfig } from "lanrelay-shared/config";
import { ConfigurationError } from "lanrelay-shared/errors";
import { createLogger } from "lanrelay-shared/logger";
import { startServer, stopServer, type RelayServer } from "./server.js";

const args = process.argv.slice(2);

function getArg(name: string): string | undefined {
  const idx = args.indexOf(`--${name}`);
  return idx !== -1 && args[idx + 1] ? args[idx + 1] : undefined;
}

const overrides: Record<string, string> = {};
const port = getArg("port");
const host = getArg("host");
const endpoints = getArg("endpoints");
if (port) overrides.RELAY_PORT = port;
if (host) overrides.RELAY_HOST = host;
if (endpoints) overrides.RELAY_ENDPOINTS_DIR = endpoints;

async function main(): Promise<void> {
  let config: RelayConfig;
  try {
    config = loadConfig({ ...process.env, ...overrides });
  } catch (err: unknown) {
    if (err instanceof ConfigurationError) {
      console.error(err.message);
      process.exit(1);
    }
    throw err;
  }

  const logger = createLogger({ level: config.logLevel, pretty: config.pretty });
  logger.info({ name: config.name, endpointsDir: config.endpointsDir }, "relay starting");

  let server: RelayServer;
  try {
    server = await startServer({ config, logger });
  } catch (err: unknown) {
    logger.fatal({ err }, "failed to start relay");
    process.exit(1);
  }

  let stopping = false;
  for (const sig of ["SIGINT", "SIGTERM"] as const) {
    process.on(sig, () => {
      if (stopping) return;
      stopping = true;
      logger.info(`Received ${sig}, shutting down...`);
      stopServer(server)
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          logger.error({ err }, "shutdown failed");
          process.exit(1);
        });
    });
  }

  process.on("SIGHUP", () => {
    server.reload().catch((err: unknown) => {
      logger.error({ err }, "endpoint reload failed; keeping the current registry");
    });
  });
}

main().catch((err: unknown) => {
  console.error("Relay crashed:", err);
  process.exit(1);
});
