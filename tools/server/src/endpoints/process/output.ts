import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { logs } from "lanrelay-shared/responses";

const schema = z.object({
  pid: z.coerce.number().int().positive(),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext) {
  return logs(ctx.executor.output(args.pid), `Output of process ${args.pid}`);
}

export default defineEndpoint({
  description: "Captured stdout/stderr lines of a process",
  methods: ["GET", "POST"],
  requiresAuth: true,
  schema,
  handler,
});
