/**
 * CLI client — HTTP client for the REST server.
 *
 *   GET  /health, GET /agent-types
 *   GET/POST /agents, GET/DELETE /agents/:id
 *   POST /agents/:id/execute
 *   GET  /agents/:id/history, DELETE /agents/:id/conversation
 *
 * Responses are validated before they reach the caller. A failed request is
 * thrown as ApiError; there is no retry.
 */

import { z } from "zod";
import type { Config } from "../config.ts";
import type { CreateAgentBody, ExecuteBody } from "../daemon/app.ts";

// ── Response shapes ────────────────────────────────────────────────

const descriptorSchema = z.object({ type: z.string(), id: z.string() });

const infoSchema = descriptorSchema.extend({
  name: z.string(),
  description: z.string(),
  model: z.string(),
  keepHistory: z.boolean(),
  historyLength: z.number(),
  createdAt: z.string(),
});

const executeResultSchema = z.object({
  response: z.string(),
  context: z.object({ repository: z.string().nullable(), timestamp: z.string() }),
});

const historySchema = z.object({
  id: z.string(),
  turns: z.array(z.object({ role: z.enum(["user", "assistant"]), content: z.string() })),
});

const healthSchema = z.object({
  status: z.string(),
  agents: z.number().optional(),
  uptime: z.number().optional(),
});

const typesSchema = z.object({ types: z.array(z.string()) });

const okSchema = z.object({ ok: z.literal(true) });

const errorBodySchema = z.object({ error: z.string(), code: z.string().optional() });

export type RemoteAgent = z.infer<typeof descriptorSchema>;
export type RemoteAgentInfo = z.infer<typeof infoSchema>;
export type ExecuteResult = z.infer<typeof executeResultSchema>;
export type RemoteHistory = z.infer<typeof historySchema>;
export type HealthStatus = z.infer<typeof healthSchema>;

// ── Errors ─────────────────────────────────────────────────────────

export class ApiError extends Error {
  constructor(
    message: string,
    /** HTTP status; absent when the server could not be reached */
    readonly status?: number,
    readonly code?: string,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = "ApiError";
  }
}

// ── Client ─────────────────────────────────────────────────────────

export interface ClientOptions {
  /** fetch implementation (default: global fetch) */
  fetch?: typeof fetch;
  /** Per-request timeout in ms (default: 300000; model calls are slow) */
  timeoutMs?: number;
}

/** Server URL derived from SERVER_HOST / SERVER_PORT */
export function defaultServerUrl(config: Pick<Config, "serverHost" | "serverPort">): string {
  const host = config.serverHost === "0.0.0.0" ? "127.0.0.1" : config.serverHost;
  return `http://${host}:${config.serverPort}`;
}

export class AgentsClient {
  readonly baseUrl: string;
  private fetchImpl: typeof fetch;
  private timeoutMs: number;

  constructor(baseUrl: string, options: ClientOptions = {}) {
    this.baseUrl = baseUrl.replace(/\/+$/, "");
    this.fetchImpl = options.fetch ?? fetch;
    this.timeoutMs = options.timeoutMs ?? 300_000;
  }

  health(): Promise<HealthStatus> {
    return this.request("GET", "/health", healthSchema);
  }

  async agentTypes(): Promise<string[]> {
    const { types } = await this.request("GET", "/agent-types", typesSchema);
    return types;
  }

  listAgents(): Promise<RemoteAgent[]> {
    return this.request("GET", "/agents", z.array(descriptorSchema));
  }

  createAgent(body: CreateAgentBody): Promise<RemoteAgent> {
    return this.request("POST", "/agents", descriptorSchema, body);
  }

  getAgent(id: string): Promise<RemoteAgentInfo> {
    return this.request("GET", `/agents/${encodeURIComponent(id)}`, infoSchema);
  }

  async removeAgent(id: string): Promise<void> {
    await this.request("DELETE", `/agents/${encodeURIComponent(id)}`, okSchema);
  }

  execute(id: string, body: ExecuteBody): Promise<ExecuteResult> {
    return this.request("POST", `/agents/${encodeURIComponent(id)}/execute`, executeResultSchema, body);
  }

  history(id: string): Promise<RemoteHistory> {
    return this.request("GET", `/agents/${encodeURIComponent(id)}/history`, historySchema);
  }

  async clearConversation(id: string): Promise<void> {
    await this.request("DELETE", `/agents/${encodeURIComponent(id)}/conversation`, okSchema);
  }

  // ── Low-level HTTP ───────────────────────────────────────────────

  private async request<T extends z.ZodTypeAny>(
    method: string,
    path: string,
    schema: T,
    body?: unknown,
  ): Promise<z.infer<T>> {
    let res: Response;
    try {
      res = await this.fetchImpl(`${this.baseUrl}${path}`, {
        method,
        headers: body !== undefined ? { "Content-Type": "application/json" } : undefined,
        body: body !== undefined ? JSON.stringify(body) : undefined,
        signal: AbortSignal.timeout(this.timeoutMs),
      });
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ApiError(`Cannot reach server at ${this.baseUrl}: ${message}`, undefined, undefined, {
        cause: error,
      });
    }

    const data: unknown = await res.json().catch(() => undefined);

    if (!res.ok) {
      const parsed = errorBodySchema.safeParse(data);
      if (parsed.success) {
        throw new ApiError(parsed.data.error, res.status, parsed.data.code);
      }
      throw new ApiError(`${method} ${path} failed with status ${res.status}`, res.status);
    }

    const parsed = schema.safeParse(data);
    if (!parsed.success) {
      throw new ApiError(`Unexpected response from ${method} ${path}`, res.status);
    }
    return parsed.data;
  }
}
