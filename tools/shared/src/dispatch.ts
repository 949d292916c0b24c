/**
 * Request dispatch: one pipeline for every endpoint call.
 *
 *   dispatch(request, ctx, { middlewares })
 *
 * Steps (first failure short-circuits):
 *   1. envelope    endpointName / method / payload / authToken well formed
 *   2. resolve     name → descriptor (NOT_FOUND), method accepted (METHOD_NOT_ALLOWED)
 *   3. auth gate   requiresAuth endpoints need a valid session (AUTH_ERROR)
 *   4. payload     endpoint's zod schema (VALIDATION_ERROR, offending fields listed)
 *   5. handler     RemoteError throws become their response; any other throw is
 *                  INTERNAL_ERROR with a sanitised message, logged with its stack
 *   6. normalise   the return value is re-checked against the response taxonomy
 *
 * Middlewares wrap steps 2-6. The auth gate sits inside the pipeline, so no
 * middleware list can remove it.
 *
 * dispatch() never throws.
 */
import { z } from "zod/v4";
import type { RemoteContext } from "./context.js";
import { ENDPOINT_METHODS, ENDPOINT_NAME_PATTERN } from "./endpoint.js";
import { RemoteError } from "./errors.js";
import { runMiddlewareChain, type RemoteMiddleware } from "./middleware.js";
import {
  authError,
  internalError,
  methodNotAllowed,
  normalizeResponse,
  notFound,
  validationError,
  type RemoteResponse,
} from "./responses.js";

// ── Request envelope ────────────────────────────────────

export const remoteRequestSchema = z.object({
  endpointName: z.string().regex(ENDPOINT_NAME_PATTERN),
  method: z.enum(ENDPOINT_METHODS),
  payload: z.record(z.string(), z.unknown()).default({}),
  authToken: z.string().optional(),
});

export type RemoteRequest = z.output<typeof remoteRequestSchema>;

/** What callers pass: payload may be omitted. */
export type RemoteRequestInput = z.input<typeof remoteRequestSchema>;

export interface DispatchOptions {
  middlewares?: readonly RemoteMiddleware[];
}

/** Same message for missing, unknown and expired tokens. */
export const AUTH_REQUIRED_MESSAGE = "Authentication required";

function fieldsOf(error: z.ZodError, fallback: string): string[] {
  const fields = error.issues.map((issue) => (issue.path.length > 0 ? issue.path.map(String).join(".") : fallback));
  return [...new Set(fields)];
}

// ── Pipeline ────────────────────────────────────────────

async function runPipeline(request: RemoteRequest, ctx: RemoteContext): Promise<RemoteResponse> {
  const name = request.endpointName;
  const descriptor = ctx.registry.lookup(name);
  if (!descriptor) {
    return notFound(`Endpoint '${name}'`);
  }

  if (!descriptor.methods.includes(request.method)) {
    return methodNotAllowed(request.method, descriptor.methods);
  }

  if (descriptor.requiresAuth && ctx.sessions.verify(request.authToken) !== "valid") {
    return authError(AUTH_REQUIRED_MESSAGE);
  }

  const parseResult = descriptor.definition.schema.safeParse(request.payload);
  if (!parseResult.success) {
    return validationError(fieldsOf(parseResult.error, "payload"));
  }

  let result: unknown;
  try {
    result = await descriptor.definition.handler(parseResult.data, ctx);
  } catch (err: unknown) {
    if (err instanceof RemoteError) {
      return err.toResponse();
    }
    ctx.logger.error({ err, endpoint: name }, "endpoint handler threw");
    return internalError(`Endpoint '${name}' failed`);
  }

  const response = normalizeResponse(result);
  if (!response) {
    ctx.logger.error({ endpoint: name }, "endpoint handler returned an unrecognised response shape");
    return internalError(`Endpoint '${name}' failed`);
  }
  return response;
}

/**
 * Dispatch one request. `request` is validated here, so transports can pass
 * whatever they parsed off the wire.
 */
export async function dispatch(
  request: unknown,
  ctx: RemoteContext,
  options: DispatchOptions = {},
): Promise<RemoteResponse> {
  const envelope = remoteRequestSchema.safeParse(request);
  if (!envelope.success) {
    return validationError(fieldsOf(envelope.error, "request"));
  }

  const valid = envelope.data;
  try {
    return await runMiddlewareChain(options.middlewares ?? [], valid, ctx, () => runPipeline(valid, ctx));
  } catch (err: unknown) {
    ctx.logger.error({ err, endpoint: valid.endpointName }, "dispatch middleware threw");
    return internalError(`Endpoint '${valid.endpointName}' failed`);
  }
}
