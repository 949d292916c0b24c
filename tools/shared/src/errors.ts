/**
 * Throwable forms of the response taxonomy.
 *
 * Services and handlers throw these instead of building transport errors;
 * dispatch() turns them back into responses with toResponse(). Anything else
 * that escapes a handler is treated as an internal fault.
 *
 * ConfigurationError is the odd one out: it stops startup (bad env, endpoint
 * name collisions) and never reaches a client.
 */
import {
  authError,
  internalError,
  notFound,
  validationError,
  type ErrorResponse,
} from "./responses.js";

export abstract class RemoteError extends Error {
  abstract toResponse(): ErrorResponse;
}

export class ValidationError extends RemoteError {
  readonly fields: readonly string[];

  constructor(fields: readonly string[], message?: string) {
    super(message ?? `Missing or invalid field: ${fields.join(", ")}`);
    this.name = "ValidationError";
    this.fields = fields;
  }

  toResponse(): ErrorResponse {
    return validationError(this.fields, this.message);
  }
}

export class AuthError extends RemoteError {
  constructor(message = "Unauthorized") {
    super(message);
    this.name = "AuthError";
  }

  toResponse(): ErrorResponse {
    return authError(this.message);
  }
}

export class NotFoundError extends RemoteError {
  readonly resource: string;

  constructor(resource: string) {
    super(`${resource} not found`);
    this.name = "NotFoundError";
    this.resource = resource;
  }

  toResponse(): ErrorResponse {
    return notFound(this.resource);
  }
}

/** `message` must be safe to show a client; put detail in `cause`. */
export class InternalError extends RemoteError {
  constructor(message = "Internal server error", options?: { cause?: unknown }) {
    super(message, options);
    this.name = "InternalError";
  }

  toResponse(): ErrorResponse {
    return internalError(this.message);
  }
}

export class ConfigurationError extends Error {
  readonly problems: readonly string[];

  constructor(message: string, problems: readonly string[] = []) {
    super(problems.length > 0 ? `${message}: ${problems.join("; ")}` : message);
    this.name = "ConfigurationError";
    this.problems = problems;
  }
}
