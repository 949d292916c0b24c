import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { systemInfo } from "lanrelay-shared/responses";

export function handler(_args: unknown, ctx: RemoteContext) {
  return systemInfo({ ...ctx.system.specs() }, "System specifications");
}

export default defineEndpoint({
  description: "Host name, OS, CPU, memory and uptime",
  methods: ["GET", "POST"],
  schema: z.object({}),
  handler,
});
