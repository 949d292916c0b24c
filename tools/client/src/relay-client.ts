/**
 * HTTP client for a relay.
 *
 *   const client = new RelayClient({ baseUrl: "http://192.168.1.20:5000" });
 *   await client.login("admin", "secret");
 *   const reply = await client.command("execute", { line: "uptime" });
 *
 * Every reply is checked against the wire shape; a non-2xx status or an error
 * body raises RelayRequestError.
 */
import { z } from "zod/v4";

const successBodySchema = z.object({
  status: z.literal("success"),
  message: z.string(),
  data: z.unknown().optional(),
});

const errorBodySchema = z.object({
  status: z.literal("error"),
  message: z.string(),
  code: z.string(),
  fields: z.array(z.string()).optional(),
  allowed: z.array(z.string()).optional(),
});

const wireBodySchema = z.discriminatedUnion("status", [successBodySchema, errorBodySchema]);

export type RelayReply = z.infer<typeof successBodySchema>;

const loginDataSchema = z.object({
  token: z.string(),
  expires_at: z.string().nullable(),
});

const healthDataSchema = z.object({
  name: z.string(),
  status: z.enum(["healthy", "degraded"]),
  last_health_check: z.string(),
});

const treeDataSchema = z.object({
  endpoints: z.array(
    z.object({
      name: z.string(),
      kind: z.enum(["simple", "complex"]),
      methods: z.array(z.string()),
      requiresAuth: z.boolean(),
      description: z.string(),
    }),
  ),
});

export type RelayHealth = z.infer<typeof healthDataSchema>;
export type RelayEndpointInfo = z.infer<typeof treeDataSchema>["endpoints"][number];

export class RelayRequestError extends Error {
  readonly status: number;
  /** Error code from the body, or "BAD_RESPONSE" / "NETWORK_ERROR". */
  readonly code: string;
  readonly fields: readonly string[];

  constructor(status: number, code: string, message: string, fields: readonly string[] = []) {
    super(message);
    this.name = "RelayRequestError";
    this.status = status;
    this.code = code;
    this.fields = fields;
  }
}

export interface RelayClientOptions {
  baseUrl: string;
  token?: string;
  /** Default 10s. */
  timeoutMs?: number;
}

const DEFAULT_TIMEOUT_MS = 10_000;

export class RelayClient {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private currentToken: string | undefined;

  constructor(options: RelayClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUT_MS;
    this.currentToken = options.token;
  }

  get token(): string | undefined {
    return this.currentToken;
  }

  test(): Promise<RelayReply> {
    return this.request("GET", "/api/test");
  }

  async health(): Promise<RelayHealth> {
    const reply = await this.request("GET", "/api/health");
    return this.dataOf(reply, healthDataSchema);
  }

  async tree(): Promise<RelayEndpointInfo[]> {
    const reply = await this.request("GET", "/api/tree");
    return this.dataOf(reply, treeDataSchema).endpoints;
  }

  /** Log in and keep the token for later calls. */
  async login(username: string, password: string): Promise<string> {
    const reply = await this.request("POST", "/api/login", { username, password });
    const { token } = this.dataOf(reply, loginDataSchema);
    this.currentToken = token;
    return token;
  }

  async logout(): Promise<void> {
    if (this.currentToken === undefined) return;
    await this.request("POST", "/api/logout", { token: this.currentToken });
    this.currentToken = undefined;
  }

  /** `payload` must not carry a `command` key: on the wire it names the endpoint. */
  async command(name: string, payload: Record<string, unknown> = {}): Promise<RelayReply> {
    if ("command" in payload) {
      throw new RelayRequestError(0, "VALIDATION_ERROR", "Payload field 'command' is reserved for the endpoint name", [
        "command",
      ]);
    }
    return this.request("POST", "/api/command", { command: name, ...payload });
  }

  // ── Internals ────────────────────────────────────────

  private async request(method: "GET" | "POST", route: string, body?: unknown): Promise<RelayReply> {
    const headers: Record<string, string> = { Accept: "application/json" };
    if (body !== undefined) headers["Content-Type"] = "application/json";
    if (this.currentToken !== undefined) headers.Authorization = `Bearer ${this.currentToken}`;

    let res: Response;
    try {
      res = await fetch(`${this.baseUrl}${route}`, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (err: unknown) {
      const reason = err instanceof Error ? err.message : String(err);
      throw new RelayRequestError(0, "NETWORK_ERROR", `Relay unreachable at ${this.baseUrl}: ${reason}`);
    }

    const text = await res.text();
    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch {
      throw new RelayRequestError(res.status, "BAD_RESPONSE", `Invalid JSON response from relay: ${text.slice(0, 200)}`);
    }

    const parsed = wireBodySchema.safeParse(raw);
    if (!parsed.success) {
      throw new RelayRequestError(res.status, "BAD_RESPONSE", "Unrecognised response body from relay");
    }

    const reply = parsed.data;
    if (reply.status === "error") {
      throw new RelayRequestError(res.status, reply.code, reply.message, reply.fields ?? []);
    }
    if (!res.ok) {
      throw new RelayRequestError(res.status, "BAD_RESPONSE", reply.message);
    }
    return reply;
  }

  private dataOf<T>(reply: RelayReply, schema: z.ZodType<T>): T {
    const parsed = schema.safeParse(reply.data);
    if (!parsed.success) {
      throw new RelayRequestError(200, "BAD_RESPONSE", `Unexpected data in reply: ${reply.message}`);
    }
    return parsed.data;
  }
}
