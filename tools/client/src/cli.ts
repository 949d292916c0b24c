/**
 * relay CLI: send one command to a relay and print the reply.
 *
 * Usage: relay <url> <command> [json-payload]
 *
 * Examples:
 *   relay http://192.168.1.20:5000 test
 *   relay http://192.168.1.20:5000 get_time
 *   relay http://192.168.1.20:5000 popup '{"message": "Lunch is ready"}'
 *   RELAY_USERNAME=admin RELAY_PASSWORD=... relay http://192.168.1.20:5000 execute '{"line": "uptime"}'
 *
 * `test`, `health` and `tree` hit the built-in routes; anything else goes to
 * /api/command. With RELAY_TOKEN, or RELAY_USERNAME and RELAY_PASSWORD, the
 * call is authenticated.
 */
import "dotenv/config";
import { parsePayload } from "./parse-payload.js";
import { RelayClient, RelayRequestError } from "./relay-client.js";

function usage(): never {
  console.error("Usage: relay <url> <command> [json-payload]");
  console.error("");
  console.error("Built-in:");
  console.error("  test     Check the relay is up");
  console.error("  health   Health snapshot");
  console.error("  tree     Registered endpoints");
  console.error("");
  console.error("Examples:");
  console.error("  relay http://192.168.1.20:5000 get_time");
  console.error("  relay http://192.168.1.20:5000 popup '{\"message\": \"Hello\"}'");
  process.exit(1);
}

async function run(client: RelayClient, command: string, payload: Record<string, unknown>): Promise<unknown> {
  switch (command) {
    case "test":
      return client.test();
    case "health":
      return client.health();
    case "tree":
      return client.tree();
    default:
      return client.command(command, payload);
  }
}

async function main(): Promise<void> {
  const [url, command, json] = process.argv.slice(2);
  if (!url || !command) usage();

  let payload: Record<string, unknown>;
  try {
    payload = parsePayload(json);
  } catch (err: unknown) {
    console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    process.exit(1);
  }

  const client = new RelayClient({ baseUrl: url, token: process.env.RELAY_TOKEN });
  const username = process.env.RELAY_USERNAME;
  const password = process.env.RELAY_PASSWORD;

  try {
    let ownSession = false;
    if (client.token === undefined && username && password) {
      await client.login(username, password);
      ownSession = true;
    }
    const reply = await run(client, command, payload);
    console.log(JSON.stringify(reply, null, 2));
    if (ownSession) await client.logout();
  } catch (err: unknown) {
    if (err instanceof RelayRequestError) {
      console.error(`Error [${err.code}]: ${err.message}`);
      if (err.fields.length > 0) console.error(`Fields: ${err.fields.join(", ")}`);
      process.exit(1);
    }
    throw err;
  }
}

main().catch((err: unknown) => {
  console.error(err);
  process.exit(1);
});
