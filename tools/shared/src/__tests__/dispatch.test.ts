import { describe, it, expect, vi } from "vitest";
import { z } from "zod/v4";
import { dispatch } from "../dispatch.js";
import { defineEndpoint } from "../endpoint.js";
import { NotFoundError, ValidationError } from "../errors.js";
import type { RemoteMiddleware } from "../middleware.js";
import { EndpointRegistry } from "../registry.js";
import { processInfo, success } from "../responses.js";
import { createTestContext, fixedSessions } from "./test-context.js";

// ── Helpers ──────────────────────────────────────────────

function contextWith(definitions: Parameters<typeof EndpointRegistry.fromDefinitions>[0]) {
  return createTestContext({
    registry: EndpointRegistry.fromDefinitions(definitions),
    sessions: fixedSessions({ "good-token": "valid", "old-token": "expired" }),
  });
}

const restartService = defineEndpoint({
  schema: z.object({}),
  handler: () => success("Command executed"),
});

// ── Envelope & resolution ────────────────────────────────

describe("dispatch: envelope and resolution", () => {
  it("dispatches a known endpoint to its handler", async () => {
    const ctx = contextWith({ restart_service: restartService });
    const result = await dispatch({ endpointName: "restart_service", method: "POST", payload: {} }, ctx);
    expect(result).toEqual({ status: "success", kind: "data", message: "Command executed" });
  });

  it("defaults a missing payload to {}", async () => {
    const ctx = contextWith({ restart_service: restartService });
    const result = await dispatch({ endpointName: "restart_service", method: "POST" }, ctx);
    expect(result.status).toBe("success");
  });

  it("lists malformed envelope fields", async () => {
    const ctx = contextWith({});
    const result = await dispatch({ endpointName: "", method: "DELETE", payload: [] }, ctx);
    expect(result.kind).toBe("validation");
    if (result.kind !== "validation") return;
    expect(result.fields).toEqual(["endpointName", "method", "payload"]);
  });

  it("rejects a request that is not an object", async () => {
    const result = await dispatch("restart_service", contextWith({}));
    expect(result.kind).toBe("validation");
    if (result.kind !== "validation") return;
    expect(result.fields).toEqual(["request"]);
  });

  it("returns not_found for unknown endpoints", async () => {
    const result = await dispatch({ endpointName: "nonexistent", method: "POST" }, contextWith({}));
    expect(result).toEqual({
      status: "error",
      kind: "not_found",
      code: "NOT_FOUND",
      message: "Endpoint 'nonexistent' not found",
    });
  });

  it("returns method_not_allowed for a method the endpoint does not take", async () => {
    const ctx = contextWith({ restart_service: restartService });
    const result = await dispatch({ endpointName: "restart_service", method: "GET" }, ctx);
    expect(result.kind).toBe("method_not_allowed");
    expect(result.message).toBe("Unsupported method: GET. Expected method: POST");
  });
});

// ── Auth gate ────────────────────────────────────────────

describe("dispatch: auth gate", () => {
  function guarded() {
    const handler = vi.fn(() => success("Shutting down"));
    const definition = defineEndpoint({ requiresAuth: true, schema: z.object({}), handler });
    return { handler, ctx: contextWith({ shutdown: definition }) };
  }

  it("runs the handler with a valid token", async () => {
    const { handler, ctx } = guarded();
    const result = await dispatch({ endpointName: "shutdown", method: "POST", authToken: "good-token" }, ctx);
    expect(result.status).toBe("success");
    expect(handler).toHaveBeenCalledOnce();
  });

  it.each([
    ["missing", undefined],
    ["unknown", "made-up-token"],
    ["expired", "old-token"],
  ])("rejects a %s token without running the handler", async (_label, authToken) => {
    const { handler, ctx } = guarded();
    const result = await dispatch({ endpointName: "shutdown", method: "POST", authToken }, ctx);
    expect(result).toEqual({
      status: "error",
      kind: "auth",
      code: "AUTH_ERROR",
      message: "Authentication required",
    });
    expect(handler).not.toHaveBeenCalled();
  });

  it("checks auth before validating the payload", async () => {
    const definition = defineEndpoint({
      requiresAuth: true,
      schema: z.object({ pid: z.number() }),
      handler: () => success("killed"),
    });
    const ctx = contextWith({ kill: definition });
    const result = await dispatch({ endpointName: "kill", method: "POST", payload: {} }, ctx);
    expect(result.kind).toBe("auth");
  });

  it("middlewares cannot bypass the gate", async () => {
    const { handler, ctx } = guarded();
    const passThrough: RemoteMiddleware = (_request, _ctx, next) => next();
    const result = await dispatch({ endpointName: "shutdown", method: "POST" }, ctx, {
      middlewares: [passThrough],
    });
    expect(result.kind).toBe("auth");
    expect(handler).not.toHaveBeenCalled();
  });
});

// ── Payload validation ───────────────────────────────────

describe("dispatch: payload validation", () => {
  const execute = defineEndpoint({
    schema: z.object({ command: z.string().min(1), args: z.array(z.string()).default([]), pid: z.number() }),
    handler: (args) => success(`ran ${args.command}`),
  });

  it("enumerates the offending fields", async () => {
    const ctx = contextWith({ execute });
    const result = await dispatch({ endpointName: "execute", method: "POST", payload: { args: "nope" } }, ctx);
    expect(result).toEqual({
      status: "error",
      kind: "validation",
      code: "VALIDATION_ERROR",
      message: "Missing or invalid field: command, args, pid",
      fields: ["command", "args", "pid"],
    });
  });

  it("passes the parsed payload to the handler", async () => {
    const ctx = contextWith({ execute });
    const result = await dispatch(
      { endpointName: "execute", method: "POST", payload: { command: "ls", pid: 1 } },
      ctx,
    );
    expect(result.message).toBe("ran ls");
  });
});

// ── Handler failures ─────────────────────────────────────

describe("dispatch: handler failures", () => {
  it("maps a thrown RemoteError onto its response", async () => {
    const kill = defineEndpoint({
      schema: z.object({ pid: z.number() }),
      handler: (args) => {
        throw new NotFoundError(`Process ${args.pid}`);
      },
    });
    const result = await dispatch({ endpointName: "kill", method: "POST", payload: { pid: 99 } }, contextWith({ kill }));
    expect(result).toEqual({ status: "error", kind: "not_found", code: "NOT_FOUND", message: "Process 99 not found" });
  });

  it("maps an async RemoteError rejection too", async () => {
    const execute = defineEndpoint({
      schema: z.object({}),
      handler: async () => {
        throw new ValidationError(["command"], "Shell operators are not allowed");
      },
    });
    const result = await dispatch({ endpointName: "execute", method: "POST" }, contextWith({ execute }));
    expect(result.kind).toBe("validation");
    expect(result.message).toBe("Shell operators are not allowed");
  });

  it("sanitises unexpected throws and logs them", async () => {
    const broken = defineEndpoint({
      schema: z.object({}),
      handler: () => {
        throw new Error("ENOENT: /etc/secret-path");
      },
    });
    const ctx = contextWith({ broken });
    const errorSpy = vi.spyOn(ctx.logger, "error");

    const result = await dispatch({ endpointName: "broken", method: "POST" }, ctx);
    expect(result).toEqual({
      status: "error",
      kind: "internal",
      code: "INTERNAL_ERROR",
      message: "Endpoint 'broken' failed",
    });
    expect(errorSpy).toHaveBeenCalledOnce();
  });

  it("turns an unrecognised return shape into an internal error", async () => {
    const sloppy = defineEndpoint({
      schema: z.object({}),
      handler: () => success("fine"),
    });
    const ctx = contextWith({
      sloppy: { ...sloppy, handler: () => Promise.resolve(JSON.parse('{"ok":true}')) },
    });
    const result = await dispatch({ endpointName: "sloppy", method: "POST" }, ctx);
    expect(result.kind).toBe("internal");
  });

  it("normalises plain response objects from handlers", async () => {
    const listing = defineEndpoint({ schema: z.object({}), handler: () => processInfo([]) });
    const result = await dispatch({ endpointName: "listing", method: "POST" }, contextWith({ listing }));
    expect(result).toEqual(processInfo([]));
    expect(Object.isFrozen(result)).toBe(true);
  });

  it("never throws when a middleware throws", async () => {
    const ctx = contextWith({ restart_service: restartService });
    const exploding: RemoteMiddleware = async () => {
      throw new Error("middleware bug");
    };
    const result = await dispatch({ endpointName: "restart_service", method: "POST" }, ctx, {
      middlewares: [exploding],
    });
    expect(result.message).toBe("Endpoint 'restart_service' failed");
  });
});
