/**
 * Endpoint definitions: what a handler module default-exports.
 *
 * A handler file under the endpoints tree looks like:
 *
 *   const schema = z.object({ pid: z.number().int() });
 *   type Args = z.infer<typeof schema>;
 *
 *   export function handler(args: Args, ctx: RemoteContext): RemoteResponse { ... }
 *
 *   export default defineEndpoint({
 *     description: "Kill a running process",
 *     requiresAuth: true,
 *     schema,
 *     handler,
 *   });
 *
 * Modules carry no registration side effects; the registry binds the default
 * export when it loads the tree.
 */
import { z } from "zod/v4";
import type { RemoteContext } from "./context.js";
import type { RemoteResponse } from "./responses.js";

export const ENDPOINT_METHODS = ["GET", "POST", "OPTIONS"] as const;
export type EndpointMethod = (typeof ENDPOINT_METHODS)[number];

/** Endpoint names: file or directory base names, also what clients send. */
export const ENDPOINT_NAME_PATTERN = /^[A-Za-z0-9][A-Za-z0-9_-]*$/;

export interface EndpointDefinition<T = unknown> {
  readonly description: string;
  readonly methods: readonly EndpointMethod[];
  readonly requiresAuth: boolean;
  readonly schema: z.ZodType<T>;
  // Method syntax: a definition for specific args is still storable as EndpointDefinition<unknown>
  handler(args: T, ctx: RemoteContext): RemoteResponse | Promise<RemoteResponse>;
}

export interface EndpointOptions<T> {
  description?: string;
  /** Defaults to ["POST"]. */
  methods?: readonly EndpointMethod[];
  /** Defaults to false. */
  requiresAuth?: boolean;
  schema: z.ZodType<T>;
  handler(args: T, ctx: RemoteContext): RemoteResponse | Promise<RemoteResponse>;
}

export function defineEndpoint<T>(options: EndpointOptions<T>): EndpointDefinition<T> {
  const definition: EndpointDefinition<T> = Object.freeze({
    description: options.description ?? "",
    methods: Object.freeze([...(options.methods ?? ["POST"])]),
    requiresAuth: options.requiresAuth ?? false,
    schema: options.schema,
    handler: options.handler,
  });
  return definition;
}

/** Structural check for module exports the compiler never saw. */
export function isEndpointDefinition(value: unknown): value is EndpointDefinition {
  if (typeof value !== "object" || value === null) return false;
  if (!("handler" in value) || typeof value.handler !== "function") return false;
  if (!("schema" in value) || !(value.schema instanceof z.ZodType)) return false;
  if (!("requiresAuth" in value) || typeof value.requiresAuth !== "boolean") return false;
  if (!("description" in value) || typeof value.description !== "string") return false;
  if (!("methods" in value) || !Array.isArray(value.methods)) return false;
  return value.methods.every((m: unknown) => ENDPOINT_METHODS.some((known) => known === m));
}
