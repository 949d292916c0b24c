import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { success } from "lanrelay-shared/responses";
import { shutdownCommand } from "./shutdown-command.js";

const schema = z.object({
  /** Delay before shutdown, in seconds. */
  time: z.coerce.number().int().min(0).default(0),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext, platform: NodeJS.Platform = process.platform) {
  const [program, ...rest] = shutdownCommand(platform, args.time);
  ctx.logger.warn({ delaySeconds: args.time }, "host shutdown requested");
  const record = ctx.executor.execute(program, rest);
  return success(
    `PC shutdown command issued successfully. System will shut down in ${args.time} seconds.`,
    { pid: record.pid, command: record.command },
  );
}

export default defineEndpoint({
  description: "Power off the relay host, optionally after a delay",
  methods: ["POST"],
  requiresAuth: true,
  schema,
  handler: (args, ctx) => handler(args, ctx),
});
