import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { success } from "lanrelay-shared/responses";

const schema = z.object({
  pid: z.coerce.number().int().positive(),
  signal: z.enum(["SIGTERM", "SIGINT", "SIGKILL", "SIGHUP"]).default("SIGTERM"),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext) {
  ctx.executor.kill(args.pid, args.signal);
  return success(`Signal ${args.signal} sent to process ${args.pid}`, { pid: args.pid, signal: args.signal });
}

export default defineEndpoint({
  description: "Stop a process started by execute or launch",
  methods: ["POST"],
  requiresAuth: true,
  schema,
  handler,
});
