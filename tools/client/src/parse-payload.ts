function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Parse the CLI's optional JSON payload argument. Must be a JSON object. */
export function parsePayload(text: string | undefined): Record<string, unknown> {
  if (text === undefined || text.trim() === "") return {};

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    throw new Error(`Invalid JSON payload: ${text}`);
  }
  if (!isRecord(parsed)) {
    throw new Error("Payload must be a JSON object");
  }
  return parsed;
}
