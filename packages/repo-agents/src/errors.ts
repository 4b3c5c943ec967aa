/**
 * Error taxonomy for agent dispatch.
 *
 * Every failure the core raises is one of these classes. The core never
 * translates or swallows them; boundary adapters (CLI, HTTP) map them to exit
 * codes and status codes through toHttpError().
 */

export type ErrorCode =
  | "missing_credential"
  | "unknown_agent_type"
  | "agent_not_found"
  | "duplicate_agent"
  | "upstream_error"
  | "rate_limited"
  | "timeout"
  | "not_found"
  | "auth_error"
  | "validation_error";

export abstract class AgentsError extends Error {
  abstract readonly code: ErrorCode;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** A provider or GitHub credential is absent from configuration */
export class MissingCredentialError extends AgentsError {
  readonly code = "missing_credential";

  constructor(readonly variable: string) {
    super(`Missing credential: ${variable} is not set`);
  }
}

export class UnknownAgentTypeError extends AgentsError {
  readonly code = "unknown_agent_type";

  constructor(
    readonly type: string,
    readonly available: readonly string[],
  ) {
    super(`Unknown agent type: ${type}. Available: ${available.join(", ")}`);
  }
}

export class AgentNotFoundError extends AgentsError {
  readonly code = "agent_not_found";

  constructor(readonly id: string) {
    super(`Agent not found: ${id}`);
  }
}

export class DuplicateAgentError extends AgentsError {
  readonly code = "duplicate_agent";

  constructor(readonly id: string) {
    super(`Agent already exists: ${id}`);
  }
}

/** Provider (or GitHub) returned an error that is not more specific */
export class UpstreamError extends AgentsError {
  readonly code = "upstream_error";

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
  }
}

export class RateLimitedError extends AgentsError {
  readonly code = "rate_limited";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class TimeoutError extends AgentsError {
  readonly code = "timeout";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** GitHub resource does not exist, or the token cannot see it */
export class NotFoundError extends AgentsError {
  readonly code = "not_found";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

/** GitHub rejected the token */
export class AuthError extends AgentsError {
  readonly code = "auth_error";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
  }
}

export class ValidationError extends AgentsError {
  readonly code = "validation_error";

  constructor(message: string) {
    super(message);
  }
}

// ── Classification ─────────────────────────────────────────────────

const NETWORK_CODES = [
  "ECONNRESET",
  "ECONNREFUSED",
  "ECONNABORTED",
  "EPIPE",
  "EAI_AGAIN",
  "EHOSTUNREACH",
  "ENETUNREACH",
];

const RATE_LIMIT_PATTERNS = ["rate limit", "too many requests", "overloaded"];

const TIMEOUT_PATTERNS = ["timeout", "timed out", "etimedout"];

function fieldOf(error: unknown, key: string): unknown {
  if (typeof error !== "object" || error === null) return undefined;
  return Reflect.get(error, key);
}

/** HTTP status carried by provider SDK errors (`statusCode`) or fetch/octokit errors (`status`) */
export function statusOf(error: unknown): number | undefined {
  const status = fieldOf(error, "statusCode") ?? fieldOf(error, "status");
  return typeof status === "number" ? status : undefined;
}

export function messageOf(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Map a raw provider/network failure onto the taxonomy.
 *
 * Inspects, in order: errors already in the taxonomy, abort/timeout signals,
 * HTTP status codes, Node.js network error codes, and message patterns.
 * Anything unrecognized becomes an UpstreamError carrying the provider's
 * message.
 */
export function classifyUpstreamError(error: unknown, label = "Provider"): AgentsError {
  if (error instanceof AgentsError) return error;

  const message = messageOf(error);
  const name = fieldOf(error, "name");

  // 1. Abort signal fired by our request timeout
  if (name === "TimeoutError" || name === "AbortError") {
    return new TimeoutError(`${label} request timed out`, { cause: error });
  }

  // 2. HTTP status code
  const status = statusOf(error);
  if (status === 429) {
    return new RateLimitedError(`${label} rate limited: ${message}`, { cause: error });
  }
  if (status === 408 || status === 504) {
    return new TimeoutError(`${label} request timed out: ${message}`, { cause: error });
  }
  if (status !== undefined) {
    return new UpstreamError(`${label} error (${status}): ${message}`, status, { cause: error });
  }

  // 3. Node.js network error codes
  const code = fieldOf(error, "code");
  if (code === "ETIMEDOUT") {
    return new TimeoutError(`${label} request timed out`, { cause: error });
  }
  if (typeof code === "string" && NETWORK_CODES.includes(code)) {
    return new UpstreamError(`${label} unreachable (${code}): ${message}`, undefined, {
      cause: error,
    });
  }

  // 4. Message patterns
  const lower = message.toLowerCase();
  if (RATE_LIMIT_PATTERNS.some((p) => lower.includes(p))) {
    return new RateLimitedError(`${label} rate limited: ${message}`, { cause: error });
  }
  if (TIMEOUT_PATTERNS.some((p) => lower.includes(p))) {
    return new TimeoutError(`${label} request timed out: ${message}`, { cause: error });
  }

  return new UpstreamError(`${label} error: ${message}`, undefined, { cause: error });
}

// ── HTTP mapping ───────────────────────────────────────────────────

export type HttpErrorStatus = 400 | 404 | 409 | 429 | 500 | 502 | 504;

export interface HttpError {
  status: HttpErrorStatus;
  body: { error: string; code: ErrorCode | "internal_error" };
}

const STATUS_BY_CODE: Record<ErrorCode, HttpErrorStatus> = {
  validation_error: 400,
  unknown_agent_type: 400,
  agent_not_found: 404,
  duplicate_agent: 409,
  rate_limited: 429,
  timeout: 504,
  upstream_error: 502,
  not_found: 502,
  auth_error: 502,
  missing_credential: 500,
};

export function toHttpError(error: unknown): HttpError {
  if (error instanceof AgentsError) {
    return {
      status: STATUS_BY_CODE[error.code],
      body: { error: error.message, code: error.code },
    };
  }
  return { status: 500, body: { error: messageOf(error), code: "internal_error" } };
}
