import { z } from "zod/v4";
import { defineEndpoint } from "lanrelay-shared/endpoint";
import { success } from "lanrelay-shared/responses";
import { formatLocalTimestamp } from "lanrelay-shared/time";

export function handler() {
  const time = formatLocalTimestamp(new Date());
  return success(time, { time });
}

export default defineEndpoint({
  description: "Current local time of the relay host",
  methods: ["GET", "POST"],
  schema: z.object({}),
  handler,
});
