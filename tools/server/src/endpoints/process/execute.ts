/**
 * Starts a command on the relay host and returns its record immediately.
 * The process keeps running after the response; poll list/output, stop it
 * with kill.
 *
 *   POST /api/command { "command": "execute", "line": "sleep 5", "args": ["--x"] }
 *
 * The command line travels as `line`: `command` names the endpoint.
 */
import { z } from "zod/v4";
import type { RemoteContext } from "lanrelay-shared/context";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { ValidationError } from "lanrelay-shared/errors";
import { processInfo } from "lanrelay-shared/responses";

const schema = z.object({
  line: z.string().trim().min(1),
  args: z.array(z.string()).default([]),
  cwd: z.string().min(1).optional(),
  env: z.record(z.string(), z.string()).optional(),
  /** Seconds before the process is killed. */
  timeout: z.coerce.number().int().positive().optional(),
});

type Args = z.infer<typeof schema>;

export function handler(args: Args, ctx: RemoteContext) {
  try {
    const record = ctx.executor.execute(args.line, args.args, {
      cwd: args.cwd,
      env: args.env,
      timeoutMs: args.timeout === undefined ? undefined : args.timeout * 1000,
    });
    return processInfo([record], "Process started");
  } catch (err: unknown) {
    // The executor names its argument `command`; callers sent `line`
    if (err instanceof ValidationError && err.fields.includes("command")) {
      throw new ValidationError(["line"], err.message);
    }
    throw err;
  }
}

export default defineEndpoint({
  description: "Run a command on the relay host",
  methods: ["POST"],
  requiresAuth: true,
  schema,
  handler,
});
