/**
 * Agent roles — a closed set of tagged variants.
 *
 * Each role fixes a system prompt and a prompt composition policy. Everything
 * that differs between agent types is decided here by switching on `kind`.
 */

import type { AgentContext } from "./context.ts";
import { ROLE_TEMPLATES, type BuiltinAgentType } from "./prompts.ts";

// ── Types ──────────────────────────────────────────────────────────

export interface ComposeInput {
  context: AgentContext;
  userInput: string;
  /** Rendered GitHub context; present only when the context names a repository */
  repositoryContext?: string;
}

export type PromptComposer = (input: ComposeInput) => string;

export type AgentRole =
  | { kind: "code_review" }
  | { kind: "issue_triage" }
  | { kind: "documentation" }
  | {
      kind: "custom";
      name: string;
      description: string;
      systemPrompt: string;
      /** Defaults to repository context (if any) followed by the input */
      compose?: PromptComposer;
    };

export function builtinRole(kind: BuiltinAgentType): AgentRole {
  switch (kind) {
    case "code_review":
      return { kind: "code_review" };
    case "issue_triage":
      return { kind: "issue_triage" };
    case "documentation":
      return { kind: "documentation" };
  }
}

// ── Role text ──────────────────────────────────────────────────────

export function systemPromptFor(role: AgentRole): string {
  return role.kind === "custom" ? role.systemPrompt : ROLE_TEMPLATES[role.kind].systemPrompt;
}

export function describeRole(role: AgentRole): { name: string; description: string } {
  if (role.kind === "custom") {
    return { name: role.name, description: role.description };
  }
  const { name, description } = ROLE_TEMPLATES[role.kind];
  return { name, description };
}

// ── Composition ────────────────────────────────────────────────────

function withRepositoryContext(repositoryContext: string | undefined, body: string): string {
  return repositoryContext ? `Repository context:\n${repositoryContext}\n\n${body}` : body;
}

/**
 * Build the user prompt for one execution. The user input always appears
 * verbatim.
 */
export function composePrompt(role: AgentRole, input: ComposeInput): string {
  const { context, userInput, repositoryContext } = input;

  switch (role.kind) {
    case "code_review":
      if (repositoryContext && context.prNumber !== undefined) {
        return [
          "Please review the following pull request:",
          repositoryContext,
          `Additional context: ${userInput}`,
          "Provide a comprehensive code review.",
        ].join("\n\n");
      }
      return withRepositoryContext(repositoryContext, `Review this code:\n\n${userInput}`);

    case "issue_triage":
      if (repositoryContext && context.issueNumber !== undefined) {
        return [
          "Please triage the following GitHub issue:",
          repositoryContext,
          `Additional context: ${userInput}`,
          "Provide triage analysis including category, priority, suggested labels, and next steps.",
        ].join("\n\n");
      }
      return withRepositoryContext(repositoryContext, `Triage this issue:\n\n${userInput}`);

    case "documentation": {
      const request = `Generate documentation for:\n\n${userInput}`;
      return repositoryContext ? `${request}\n\nRepository context:\n${repositoryContext}` : request;
    }

    case "custom":
      return role.compose ? role.compose(input) : withRepositoryContext(repositoryContext, userInput);
  }
}
