/**
 * Lists the program catalogue (RELAY_PROGRAMS_FILE). With `name`, returns
 * just that entry. Starting a program is process/launch.
 */
import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { programInfo } from "lanrelay-shared/responses";
import { findProgram, loadPrograms } from "../programs.js";

const schema = z.object({
  name: z.string().min(1).optional(),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext) {
  const file = ctx.config.programsFile;
  if (args.name !== undefined) {
    return programInfo([findProgram(file, args.name)], `Program '${args.name}'`);
  }
  const programs = loadPrograms(file);
  return programInfo(programs, `${programs.length} programs available`);
}

export default defineEndpoint({
  description: "Programs this relay can launch",
  methods: ["GET", "POST"],
  schema,
  handler,
});
