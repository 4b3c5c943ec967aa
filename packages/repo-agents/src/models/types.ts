/**
 * One conversation turn
 */
export interface Turn {
  role: "user" | "assistant";
  content: string;
}

/**
 * Capability interface every provider implements.
 *
 * One outbound call per invocation, no retries, no caching. Failures are
 * UpstreamError, RateLimitedError or TimeoutError.
 */
export interface ModelClient {
  /** Model identifier this client talks to (e.g. anthropic:claude-sonnet-4-5) */
  readonly model: string;
  /** Single prompt, optional system prompt */
  generate(prompt: string, systemPrompt?: string): Promise<string>;
  /** Multi-turn; the last turn must be from the user */
  chat(turns: readonly Turn[], systemPrompt?: string): Promise<string>;
}

export interface GenerationSettings {
  maxTokens: number;
  temperature: number;
  /** Abort the request after this many ms */
  timeoutMs: number;
}
