import { z } from "zod/v4";
import { defineEndpoint } from "../../../../endpoint.js";
import { success } from "../../../../responses.js";

export default defineEndpoint({
  description: "Switched off",
  schema: z.object({}),
  handler: () => success("retired"),
});
