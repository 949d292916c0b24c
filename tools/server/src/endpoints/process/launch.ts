/**
 * Starts a program from the catalogue by name. The catalogue path is quoted
 * so paths with spaces or backslashes reach the executor intact.
 */
import { quote } from "shell-quote";
import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { processInfo } from "lanrelay-shared/responses";
import { findProgram } from "../../programs.js";

const schema = z.object({
  name: z.string().min(1),
  args: z.array(z.string()).default([]),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext) {
  const program = findProgram(ctx.config.programsFile, args.name);
  const record = ctx.executor.execute(quote([program.path]), [...program.args, ...args.args]);
  return processInfo([record], `Program '${program.name}' started`);
}

export default defineEndpoint({
  description: "Start a catalogue program by name",
  methods: ["POST"],
  requiresAuth: true,
  schema,
  handler,
});
