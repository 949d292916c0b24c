import { z } from "zod/v4";
import { defineEndpoint } from "../../../../endpoint.js";
import { success } from "../../../../responses.js";

export default defineEndpoint({
  description: "Pretend to restart",
  requiresAuth: true,
  schema: z.object({}),
  handler: () => success("Restarting"),
});
