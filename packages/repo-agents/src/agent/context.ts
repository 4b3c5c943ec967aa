import { ValidationError } from "../errors.ts";

/**
 * Per-call execution context. Frozen on construction; owned by the call
 * that built it.
 */
export interface AgentContext {
  /** owner/name */
  readonly repository?: string;
  readonly issueNumber?: number;
  readonly prNumber?: number;
  readonly metadata: Readonly<Record<string, unknown>>;
  /** ISO-8601 construction time */
  readonly timestamp: string;
}

export interface AgentContextInit {
  repository?: string;
  issueNumber?: number;
  prNumber?: number;
  metadata?: Record<string, unknown>;
}

function checkNumber(field: string, value: number | undefined): void {
  if (value === undefined) return;
  if (!Number.isInteger(value) || value <= 0) {
    throw new ValidationError(`${field} must be a positive integer, got ${value}`);
  }
}

export function createAgentContext(init: AgentContextInit = {}): AgentContext {
  checkNumber("issue_number", init.issueNumber);
  checkNumber("pr_number", init.prNumber);

  return Object.freeze({
    repository: init.repository?.trim() || undefined,
    issueNumber: init.issueNumber,
    prNumber: init.prNumber,
    metadata: Object.freeze({ ...init.metadata }),
    timestamp: new Date().toISOString(),
  });
}
