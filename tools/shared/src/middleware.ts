/**
 * Dispatch middleware: onion-model wrappers around the endpoint pipeline.
 *
 *   outerMiddleware → innerMiddleware → pipeline → innerMiddleware → outerMiddleware
 *
 * Each middleware receives (request, ctx, next) and decides whether to:
 *   - Call next() to proceed down the chain
 *   - Short-circuit by returning a RemoteResponse without calling next()
 *   - Inspect or replace the response from next()
 *
 * Middlewares see the request after its envelope has been validated. They run
 * outside the auth gate, so they must not assume the caller is authenticated.
 *
 * List order = execution order: first in the list = outermost wrapper.
 */
import type { RemoteContext } from "./context.js";
import type { RemoteRequest } from "./dispatch.js";
import type { RemoteResponse } from "./responses.js";

export type RemoteNext = () => Promise<RemoteResponse>;
export type RemoteMiddleware = (
  request: RemoteRequest,
  ctx: RemoteContext,
  next: RemoteNext,
) => Promise<RemoteResponse>;

// ── Chain runner ────────────────────────────────────────

/**
 * Run `middlewares` around `handler`.
 * Builds a nested next() chain from the inside out.
 */
export async function runMiddlewareChain(
  middlewares: readonly RemoteMiddleware[],
  request: RemoteRequest,
  ctx: RemoteContext,
  handler: RemoteNext,
): Promise<RemoteResponse> {
  if (middlewares.length === 0) {
    return handler();
  }

  // last middleware wraps handler, first middleware is outermost
  let next: RemoteNext = handler;

  for (let i = middlewares.length - 1; i >= 0; i--) {
    const mw = middlewares[i];
    const innerNext = next;
    next = () => mw(request, ctx, innerNext);
  }

  return next();
}

// ── Built-in middlewares ────────────────────────────────

/**
 * Logs one line per dispatched request: endpoint, method, response kind and
 * duration. Errors are logged at warn so a quiet `info` log still shows them.
 */
export const requestLogMiddleware: RemoteMiddleware = async (request, ctx, next) => {
  const started = performance.now();
  const response = await next();
  const durationMs = Math.round(performance.now() - started);

  const fields = {
    endpoint: request.endpointName,
    method: request.method,
    status: response.status,
    kind: response.kind,
    durationMs,
  };
  if (response.status === "error") {
    ctx.logger.warn(fields, "dispatch failed");
  } else {
    ctx.logger.info(fields, "dispatch complete");
  }
  return response;
};
