import { z } from "zod/v4";
import { defineEndpoint } from "../../../endpoint.js";
import { success } from "../../../responses.js";

export default defineEndpoint({
  description: "Reply with pong",
  methods: ["GET", "POST"],
  schema: z.object({}),
  handler: () => success("pong"),
});
