/**
 * Response taxonomy: the closed set of shapes a relay endpoint can produce.
 *
 * Two branches, discriminated by `kind`:
 *   success   data | process | program | system_info | log
 *   error     validation | auth | not_found | method_not_allowed | internal
 *
 * Every response is built through the constructors below, so `status` always
 * agrees with `kind` and an error can never carry a success payload.
 * Responses are frozen; toWire() is the only place they become JSON bodies.
 */
import { z } from "zod/v4";
import type { LogEntry, ProcessRecord, ProgramEntry } from "./types.js";

// ── Response types ──────────────────────────────────────

export interface DataResponse {
  readonly status: "success";
  readonly kind: "data";
  readonly message: string;
  readonly data?: Readonly<Record<string, unknown>>;
}

export interface ProcessResponse {
  readonly status: "success";
  readonly kind: "process";
  readonly message: string;
  readonly data: { readonly processes: readonly ProcessRecord[] };
}

export interface ProgramResponse {
  readonly status: "success";
  readonly kind: "program";
  readonly message: string;
  readonly data: { readonly programs: readonly ProgramEntry[] };
}

export interface SystemInfoResponse {
  readonly status: "success";
  readonly kind: "system_info";
  readonly message: string;
  readonly data: Readonly<Record<string, unknown>>;
}

export interface LogResponse {
  readonly status: "success";
  readonly kind: "log";
  readonly message: string;
  readonly data: { readonly logs: readonly LogEntry[] };
}

export type SuccessResponse =
  | DataResponse
  | ProcessResponse
  | ProgramResponse
  | SystemInfoResponse
  | LogResponse;

export interface ValidationErrorResponse {
  readonly status: "error";
  readonly kind: "validation";
  readonly code: "VALIDATION_ERROR";
  readonly message: string;
  readonly fields: readonly string[];
}

export interface AuthErrorResponse {
  readonly status: "error";
  readonly kind: "auth";
  readonly code: "AUTH_ERROR";
  readonly message: string;
}

export interface NotFoundResponse {
  readonly status: "error";
  readonly kind: "not_found";
  readonly code: "NOT_FOUND";
  readonly message: string;
}

export interface MethodNotAllowedResponse {
  readonly status: "error";
  readonly kind: "method_not_allowed";
  readonly code: "METHOD_NOT_ALLOWED";
  readonly message: string;
  readonly allowed: readonly string[];
}

export interface InternalErrorResponse {
  readonly status: "error";
  readonly kind: "internal";
  readonly code: "INTERNAL_ERROR";
  readonly message: string;
}

export type ErrorResponse =
  | ValidationErrorResponse
  | AuthErrorResponse
  | NotFoundResponse
  | MethodNotAllowedResponse
  | InternalErrorResponse;

export type RemoteResponse = SuccessResponse | ErrorResponse;

export type ErrorCode = ErrorResponse["code"];

// ── Constructors ────────────────────────────────────────

export function success(message: string, data?: Record<string, unknown>): DataResponse {
  if (data === undefined) {
    return Object.freeze({ status: "success", kind: "data", message });
  }
  return Object.freeze({ status: "success", kind: "data", message, data: Object.freeze({ ...data }) });
}

export function processInfo(
  processes: readonly ProcessRecord[],
  message = "Process operation successful",
): ProcessResponse {
  return Object.freeze({
    status: "success",
    kind: "process",
    message,
    data: Object.freeze({ processes: Object.freeze([...processes]) }),
  });
}

export function programInfo(
  programs: readonly ProgramEntry[],
  message = "Program operation successful",
): ProgramResponse {
  return Object.freeze({
    status: "success",
    kind: "program",
    message,
    data: Object.freeze({ programs: Object.freeze([...programs]) }),
  });
}

export function systemInfo(info: Record<string, unknown>, message = "System information"): SystemInfoResponse {
  return Object.freeze({ status: "success", kind: "system_info", message, data: Object.freeze({ ...info }) });
}

export function logs(entries: readonly LogEntry[], message = "Logs retrieved"): LogResponse {
  return Object.freeze({
    status: "success",
    kind: "log",
    message,
    data: Object.freeze({ logs: Object.freeze([...entries]) }),
  });
}

export function validationError(fields: readonly string[], message?: string): ValidationErrorResponse {
  return Object.freeze({
    status: "error",
    kind: "validation",
    code: "VALIDATION_ERROR",
    message: message ?? `Missing or invalid field: ${fields.join(", ")}`,
    fields: Object.freeze([...fields]),
  });
}

export function authError(message = "Unauthorized"): AuthErrorResponse {
  return Object.freeze({ status: "error", kind: "auth", code: "AUTH_ERROR", message });
}

/** `resource` is the human name of what was missing, e.g. "Endpoint 'popup'". */
export function notFound(resource: string): NotFoundResponse {
  return Object.freeze({ status: "error", kind: "not_found", code: "NOT_FOUND", message: `${resource} not found` });
}

export function methodNotAllowed(method: string, allowed: readonly string[]): MethodNotAllowedResponse {
  return Object.freeze({
    status: "error",
    kind: "method_not_allowed",
    code: "METHOD_NOT_ALLOWED",
    message: `Unsupported method: ${method}. Expected method: ${allowed.join(", ")}`,
    allowed: Object.freeze([...allowed]),
  });
}

export function internalError(message = "Internal server error"): InternalErrorResponse {
  return Object.freeze({ status: "error", kind: "internal", code: "INTERNAL_ERROR", message });
}

// ── Guards ──────────────────────────────────────────────

export function isSuccess(response: RemoteResponse): response is SuccessResponse {
  return response.status === "success";
}

export function isError(response: RemoteResponse): response is ErrorResponse {
  return response.status === "error";
}

// ── Runtime schema ──────────────────────────────────────

const processRecordSchema = z.object({
  pid: z.number().int(),
  command: z.string(),
  argv: z.array(z.string()),
  startedAt: z.date(),
  state: z.enum(["running", "killed", "exited"]),
  exitCode: z.number().int().nullable(),
  signal: z.string().nullable(),
  endedAt: z.date().nullable(),
});

const programEntrySchema = z.object({
  name: z.string(),
  path: z.string(),
  args: z.array(z.string()),
  description: z.string(),
});

const logEntrySchema = z.object({
  stream: z.enum(["stdout", "stderr"]),
  line: z.string(),
});

/**
 * Structural schema for every response case. Used to check values coming back
 * from dynamically loaded handlers, which the compiler never saw.
 */
export const remoteResponseSchema = z.discriminatedUnion("kind", [
  z.object({
    status: z.literal("success"),
    kind: z.literal("data"),
    message: z.string(),
    data: z.record(z.string(), z.unknown()).optional(),
  }),
  z.object({
    status: z.literal("success"),
    kind: z.literal("process"),
    message: z.string(),
    data: z.object({ processes: z.array(processRecordSchema) }),
  }),
  z.object({
    status: z.literal("success"),
    kind: z.literal("program"),
    message: z.string(),
    data: z.object({ programs: z.array(programEntrySchema) }),
  }),
  z.object({
    status: z.literal("success"),
    kind: z.literal("system_info"),
    message: z.string(),
    data: z.record(z.string(), z.unknown()),
  }),
  z.object({
    status: z.literal("success"),
    kind: z.literal("log"),
    message: z.string(),
    data: z.object({ logs: z.array(logEntrySchema) }),
  }),
  z.object({
    status: z.literal("error"),
    kind: z.literal("validation"),
    code: z.literal("VALIDATION_ERROR"),
    message: z.string(),
    fields: z.array(z.string()),
  }),
  z.object({
    status: z.literal("error"),
    kind: z.literal("auth"),
    code: z.literal("AUTH_ERROR"),
    message: z.string(),
  }),
  z.object({
    status: z.literal("error"),
    kind: z.literal("not_found"),
    code: z.literal("NOT_FOUND"),
    message: z.string(),
  }),
  z.object({
    status: z.literal("error"),
    kind: z.literal("method_not_allowed"),
    code: z.literal("METHOD_NOT_ALLOWED"),
    message: z.string(),
    allowed: z.array(z.string()),
  }),
  z.object({
    status: z.literal("error"),
    kind: z.literal("internal"),
    code: z.literal("INTERNAL_ERROR"),
    message: z.string(),
  }),
]);

/**
 * Re-check an unknown value against the taxonomy. Returns a frozen response,
 * or undefined when the value is not a recognisable response shape.
 */
export function normalizeResponse(value: unknown): RemoteResponse | undefined {
  const parsed = remoteResponseSchema.safeParse(value);
  if (!parsed.success) return undefined;

  const response = parsed.data;
  switch (response.kind) {
    case "data":
      return success(response.message, response.data);
    case "process":
      return processInfo(response.data.processes, response.message);
    case "program":
      return programInfo(response.data.programs, response.message);
    case "system_info":
      return systemInfo(response.data, response.message);
    case "log":
      return logs(response.data.logs, response.message);
    case "validation":
      return validationError(response.fields, response.message);
    case "auth":
      return authError(response.message);
    case "not_found":
      return Object.freeze({ ...response });
    case "method_not_allowed":
      return Object.freeze({ ...response, allowed: Object.freeze([...response.allowed]) });
    case "internal":
      return internalError(response.message);
  }
}

// ── Wire mapping ────────────────────────────────────────

export type WireBody =
  | { status: "success"; message: string; data?: unknown }
  | {
      status: "error";
      message: string;
      code: ErrorCode;
      fields?: readonly string[];
      allowed?: readonly string[];
    };

export function httpStatusOf(response: RemoteResponse): number {
  switch (response.kind) {
    case "data":
    case "process":
    case "program":
    case "system_info":
    case "log":
      return 200;
    case "validation":
      return 400;
    case "auth":
      return 401;
    case "not_found":
      return 404;
    case "method_not_allowed":
      return 405;
    case "internal":
      return 500;
  }
}

export function toWire(response: RemoteResponse): WireBody {
  switch (response.kind) {
    case "validation":
      return { status: "error", message: response.message, code: response.code, fields: response.fields };
    case "method_not_allowed":
      return { status: "error", message: response.message, code: response.code, allowed: response.allowed };
    case "auth":
    case "not_found":
    case "internal":
      return { status: "error", message: response.message, code: response.code };
    case "data":
      return response.data === undefined
        ? { status: "success", message: response.message }
        : { status: "success", message: response.message, data: response.data };
    case "process":
    case "program":
    case "system_info":
    case "log":
      return { status: "success", message: response.message, data: response.data };
  }
}
