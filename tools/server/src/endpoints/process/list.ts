import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { processInfo } from "lanrelay-shared/responses";

export function handler(_args: unknown, ctx: RemoteContext) {
  const processes = ctx.executor.list();
  return processInfo(processes, `${processes.length} processes tracked`);
}

export default defineEndpoint({
  description: "Running processes, then recently finished ones",
  methods: ["GET", "POST"],
  requiresAuth: true,
  schema: z.object({}),
  handler,
});
