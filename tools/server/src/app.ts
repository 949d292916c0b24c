/**
 * Express app for the relay.
 *
 * Built-in routes:
 *   GET     /api/test               liveness + relay name and port
 *   POST    /api/command            { command, ...payload } → dispatch(command)
 *   GET|POST /api/endpoints/:name   dispatch(name) with query string or body as payload
 *   GET     /api/health             health snapshot
 *   GET     /api/tree               registered endpoints
 *   POST    /api/login              { username, password } → { token, expires_at }
 *   POST    /api/logout             { token } or Authorization: Bearer
 *
 * Every body leaves through toWire(); the HTTP status comes from
 * httpStatusOf(). The context is read per request through `context()`, so a
 * registry reload never changes the context of a request already running.
 */
import cors from "cors";
import express, { type Express, type NextFunction, type Request, type Response } from "express";
import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { dispatch } from "lanrelay-shared/dispatch";
import type { EndpointMethod } from "lanrelay-shared/endpoint";
import { RemoteError } from "lanrelay-shared/errors";
import type { RemoteMiddleware } from "lanrelay-shared/middleware";
import {
  httpStatusOf,
  internalError,
  methodNotAllowed,
  notFound,
  success,
  toWire,
  validationError,
  type RemoteResponse,
} from "lanrelay-shared/responses";
import { requestIdMiddleware, requestLogger } from "./request-log.js";

export interface AppOptions {
  context: () => RemoteContext;
  middlewares?: readonly RemoteMiddleware[];
}

type RouteHandler = (req: Request, ctx: RemoteContext) => RemoteResponse | Promise<RemoteResponse>;

const loginSchema = z.object({
  username: z.string(),
  password: z.string(),
});

// ── Helpers ─────────────────────────────────────────────

function send(res: Response, response: RemoteResponse): void {
  res.status(httpStatusOf(response)).json(toWire(response));
}

function bearerToken(req: Request): string | undefined {
  const header = req.get("authorization");
  if (!header) return undefined;
  const match = /^Bearer\s+(\S+)$/i.exec(header.trim());
  return match ? match[1] : undefined;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** CORS origins match on any port: "http://localhost" allows http://localhost:3000. */
export function originMatchers(origins: readonly string[]): RegExp[] {
  return origins.map((origin) => {
    const escaped = origin.replace(/\/+$/, "").replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
    return new RegExp(`^${escaped}(:\\d+)?$`);
  });
}

function isBodyParseError(err: unknown): boolean {
  return err instanceof SyntaxError && "type" in err && err.type === "entity.parse.failed";
}

// ── App ─────────────────────────────────────────────────

export function createApp(options: AppOptions): Express {
  const { context } = options;
  const middlewares = options.middlewares ?? [];
  const app = express();

  // One context per request, taken when the request arrives
  const route =
    (handler: RouteHandler) =>
    (req: Request, res: Response, next: NextFunction): void => {
      const ctx = context();
      Promise.resolve()
        .then(() => handler(req, ctx))
        .then((response) => send(res, response))
        .catch(next);
    };

  const runEndpoint = (name: string, method: EndpointMethod, payload: unknown, req: Request, ctx: RemoteContext) =>
    dispatch({ endpointName: name, method, payload, authToken: bearerToken(req) }, ctx, { middlewares });

  app.disable("x-powered-by");
  app.use(requestIdMiddleware);
  app.use(requestLogger(() => context().logger));
  app.use(cors({ origin: originMatchers(context().config.corsOrigins) }));
  app.use(express.json({ limit: "1mb" }));

  const api = express.Router();

  api.get(
    "/test",
    route((_req, ctx) => success("APIRest is running", { name: ctx.config.name, port: ctx.config.port })),
  );

  api.post(
    "/command",
    route((req, ctx) => {
      const body: unknown = req.body;
      if (!isRecord(body)) {
        return validationError(["command"]);
      }
      const { command, ...payload } = body;
      if (typeof command !== "string" || command.trim() === "") {
        return validationError(["command"]);
      }
      return runEndpoint(command.trim(), "POST", payload, req, ctx);
    }),
  );
  api.all(
    "/command",
    route((req) => methodNotAllowed(req.method, ["POST"])),
  );

  api.get(
    "/endpoints/:name",
    route((req, ctx) => runEndpoint(req.params.name, "GET", req.query, req, ctx)),
  );
  api.post(
    "/endpoints/:name",
    route((req, ctx) => runEndpoint(req.params.name, "POST", req.body, req, ctx)),
  );

  api.get(
    "/health",
    route((_req, ctx) => {
      const snapshot = ctx.system.snapshot();
      return success(`Relay is ${snapshot.status}`, {
        name: snapshot.name,
        status: snapshot.status,
        last_health_check: snapshot.lastHealthCheck,
      });
    }),
  );

  api.get(
    "/tree",
    route((_req, ctx) => {
      const endpoints = ctx.registry.list().map((d) => ({
        name: d.name,
        kind: d.kind,
        methods: [...d.methods],
        requiresAuth: d.requiresAuth,
        description: d.description,
      }));
      return success(`${endpoints.length} endpoints registered`, { endpoints });
    }),
  );

  api.post(
    "/login",
    route((req, ctx) => {
      const parsed = loginSchema.safeParse(req.body);
      if (!parsed.success) {
        return validationError([...new Set(parsed.error.issues.map((i) => i.path.map(String).join(".") || "body"))]);
      }
      const session = ctx.sessions.login(parsed.data);
      return success("Logged in", {
        token: session.token,
        expires_at: session.expiresAt ? session.expiresAt.toISOString() : null,
      });
    }),
  );
  api.all(
    "/login",
    route((req) => methodNotAllowed(req.method, ["POST"])),
  );

  api.post(
    "/logout",
    route((req, ctx) => {
      const body: unknown = req.body;
      const fromBody = isRecord(body) && typeof body.token === "string" ? body.token : undefined;
      const token = fromBody ?? bearerToken(req);
      if (!token) {
        return validationError(["token"]);
      }
      ctx.sessions.logout(token);
      return success("Logged out");
    }),
  );
  api.all(
    "/logout",
    route((req) => methodNotAllowed(req.method, ["POST"])),
  );

  api.use(
    route((req) => notFound(`Route '${req.method} ${req.originalUrl}'`)),
  );

  app.use("/api", api);

  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    if (err instanceof RemoteError) {
      send(res, err.toResponse());
      return;
    }
    if (isBodyParseError(err)) {
      send(res, validationError(["body"], "Malformed JSON body"));
      return;
    }
    context().logger.error({ err, reqId: req.id, path: req.originalUrl }, "Unhandled route error");
    send(res, internalError());
  });

  return app;
}
