/**
 * Template for a new endpoint. Never registered: the registry skips
 * `blueprint.*`.
 *
 * Copy to `<name>.ts` (or `<name>/endpoint.ts` when it needs helper files)
 * and fill in the schema and handler. The file or directory name becomes the
 * endpoint name.
 */
import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { success, type RemoteResponse } from "lanrelay-shared/responses";

const schema = z.object({
  example: z.string().optional(),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext): RemoteResponse {
  ctx.logger.debug({ args }, "blueprint invoked");
  return success("Blueprint executed", { example: args.example ?? null });
}

export default defineEndpoint({
  description: "Endpoint template",
  methods: ["POST"],
  requiresAuth: false,
  schema,
  handler,
});
