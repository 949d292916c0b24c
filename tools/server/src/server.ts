/**
 * Relay server lifecycle.
 *
 * startServer(): config → logger → registry → sessions (+ sweeper) →
 *                executor → system info → Express listen
 * stopServer():  close HTTP → stop live processes → drop sessions
 *
 * The RemoteContext is rebuilt, never mutated: reload() swaps in a context
 * carrying the new registry, and requests already dispatched keep the one they
 * started with.
 */
import type { Server } from "node:http";
import type { AddressInfo } from "node:net";
import type { Express } from "express";
import type { Logger } from "pino";
import type { RelayConfig } from "lanrelay-shared/config";
import type { RemoteContext } from "lanrelay-shared/context";
import { createLogger } from "lanrelay-shared/logger";
import { requestLogMiddleware, type RemoteMiddleware } from "lanrelay-shared/middleware";
import { loadRegistry, type EndpointRegistry } from "lanrelay-shared/registry";
import { CommandExecutor } from "lanrelay-process/command-executor";
import { SessionManager } from "lanrelay-sessions/session-manager";
import { SystemInfoProvider } from "lanrelay-system/system-info";
import { createApp } from "./app.js";

export interface RelayServerOptions {
  config: RelayConfig;
  logger?: Logger;
  /** Use this registry instead of scanning config.endpointsDir. */
  registry?: EndpointRegistry;
  /** Dispatch middlewares. Defaults to [requestLogMiddleware]. */
  middlewares?: readonly RemoteMiddleware[];
}

export class RelayServer {
  readonly app: Express;
  private ctx: RemoteContext;
  private readonly sessions: SessionManager;
  private readonly executor: CommandExecutor;
  private readonly logger: Logger;
  private http: Server | undefined;

  private constructor(
    base: Omit<RemoteContext, "system">,
    sessions: SessionManager,
    executor: CommandExecutor,
    middlewares: readonly RemoteMiddleware[],
  ) {
    const system = new SystemInfoProvider({
      name: base.config.name,
      checks: [{ name: "endpoints", run: () => this.ctx.registry.size > 0 }],
      logger: base.logger,
    });
    this.ctx = { ...base, system };
    this.sessions = sessions;
    this.executor = executor;
    this.logger = base.logger.child({ component: "server" });
    this.app = createApp({ context: () => this.ctx, middlewares });
  }

  /** Build the context and the app. Does not listen. */
  static async create(options: RelayServerOptions): Promise<RelayServer> {
    const { config } = options;
    const logger = options.logger ?? createLogger({ level: config.logLevel, pretty: config.pretty });

    const registry = options.registry ?? (await loadRegistry(config.endpointsDir));
    logger.info({ count: registry.size, dir: config.endpointsDir }, "endpoints loaded");

    const sessions = new SessionManager({
      credentials: config.auth,
      ttlMs: config.sessionTtlMs,
      logger,
    });
    if (!sessions.loginEnabled) {
      logger.warn("RELAY_PASSWORD is not set; login and authenticated endpoints are unavailable");
    }

    const executor = new CommandExecutor({ historyLimit: config.processHistory, logger });

    return new RelayServer(
      { config, logger, registry, sessions, executor },
      sessions,
      executor,
      options.middlewares ?? [requestLogMiddleware],
    );
  }

  get context(): RemoteContext {
    return this.ctx;
  }

  /** Listen on config.host:config.port. Resolves with the bound address. */
  async listen(): Promise<AddressInfo> {
    const { host, port } = this.ctx.config;
    const http = this.app.listen(port, host);
    this.http = http;

    await new Promise<void>((resolve, reject) => {
      http.once("error", reject);
      http.once("listening", () => {
        http.off("error", reject);
        resolve();
      });
    });

    const address = http.address();
    if (address === null || typeof address === "string") {
      throw new Error(`Unexpected server address: ${String(address)}`);
    }

    // Port 0 binds an ephemeral port; report the real one from /api/test
    this.ctx = { ...this.ctx, config: { ...this.ctx.config, port: address.port } };
    this.sessions.startSweeper(this.ctx.config.sessionSweepMs);
    this.logger.info({ host: address.address, port: address.port }, "relay listening");
    return address;
  }

  /** Rescan the endpoint tree and swap the new registry in. */
  async reload(): Promise<EndpointRegistry> {
    const registry = await loadRegistry(this.ctx.config.endpointsDir);
    this.ctx = { ...this.ctx, registry };
    this.logger.info({ count: registry.size }, "endpoints reloaded");
    return registry;
  }

  async stop(): Promise<void> {
    const http = this.http;
    this.http = undefined;
    if (http) {
      await new Promise<void>((resolve, reject) => {
        http.close((err) => (err ? reject(err) : resolve()));
      });
    }
    await this.executor.shutdown();
    this.sessions.close();
    this.logger.info("relay stopped");
  }
}

export async function startServer(options: RelayServerOptions): Promise<RelayServer> {
  const server = await RelayServer.create(options);
  await server.listen();
  return server;
}

export async function stopServer(server: RelayServer): Promise<void> {
  await server.stop();
}
