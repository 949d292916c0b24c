/**
 * Shows a message on the relay host's desktop through the platform notifier
 * (notify-send, osascript or msg). The notifier runs as a tracked process.
 */
import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { InternalError } from "lanrelay-shared/errors";
import { success } from "lanrelay-shared/responses";
import { notificationCommand } from "./notifier.js";

const schema = z.object({
  message: z.string().min(1),
  title: z.string().min(1).default("Message"),
  type: z.enum(["info", "warning", "error", "success"]).default("info"),
  timeout: z.coerce.number().int().min(0).default(0),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext, platform: NodeJS.Platform = process.platform) {
  const argv = notificationCommand(platform, args);
  if (!argv) {
    throw new InternalError(`Popups are not supported on ${platform}`);
  }

  const [program, ...rest] = argv;
  const record = ctx.executor.execute(program, rest);
  return success("Message sent to client for display", { pid: record.pid, title: args.title });
}

export default defineEndpoint({
  description: "Show a desktop notification on the relay host",
  methods: ["POST"],
  schema,
  handler: (args, ctx) => handler(args, ctx),
});
