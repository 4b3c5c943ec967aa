import { describe, expect, test } from "vitest";
import { createAgentContext } from "../../src/agent/context.ts";
import { ROLE_TEMPLATES } from "../../src/agent/prompts.ts";
import { composePrompt, describeRole, systemPromptFor, type AgentRole } from "../../src/agent/roles.ts";
import { ValidationError } from "../../src/errors.ts";

const CTX = "Repository: octo/app";
const bare = createAgentContext();
const withPr = createAgentContext({ repository: "octo/app", prNumber: 42 });
const withIssue = createAgentContext({ repository: "octo/app", issueNumber: 7 });
const repoOnly = createAgentContext({ repository: "octo/app" });

describe("composePrompt", () => {
  describe("code_review", () => {
    const role: AgentRole = { kind: "code_review" };

    test("pull request", () => {
      expect(composePrompt(role, { context: withPr, userInput: "Focus on errors", repositoryContext: CTX })).toBe(
        "Please review the following pull request:\n\nRepository: octo/app\n\nAdditional context: Focus on errors\n\nProvide a comprehensive code review.",
      );
    });

    test("repository without a pull request", () => {
      expect(composePrompt(role, { context: repoOnly, userInput: "x = 1", repositoryContext: CTX })).toBe(
        "Repository context:\nRepository: octo/app\n\nReview this code:\n\nx = 1",
      );
    });

    test("no repository", () => {
      expect(composePrompt(role, { context: bare, userInput: "x = 1" })).toBe("Review this code:\n\nx = 1");
    });
  });

  describe("issue_triage", () => {
    const role: AgentRole = { kind: "issue_triage" };

    test("issue", () => {
      expect(composePrompt(role, { context: withIssue, userInput: "Seen twice", repositoryContext: CTX })).toBe(
        "Please triage the following GitHub issue:\n\nRepository: octo/app\n\nAdditional context: Seen twice\n\nProvide triage analysis including category, priority, suggested labels, and next steps.",
      );
    });

    test("no repository", () => {
      expect(composePrompt(role, { context: bare, userInput: "App crashes" })).toBe(
        "Triage this issue:\n\nApp crashes",
      );
    });
  });

  describe("documentation", () => {
    const role: AgentRole = { kind: "documentation" };

    test("repository context follows the request", () => {
      expect(composePrompt(role, { context: repoOnly, userInput: "parseArgs()", repositoryContext: CTX })).toBe(
        "Generate documentation for:\n\nparseArgs()\n\nRepository context:\nRepository: octo/app",
      );
    });

    test("no repository", () => {
      expect(composePrompt(role, { context: bare, userInput: "parseArgs()" })).toBe(
        "Generate documentation for:\n\nparseArgs()",
      );
    });
  });

  describe("custom", () => {
    const base = { kind: "custom", name: "Echo", description: "Echoes", systemPrompt: "Echo." } as const;

    test("default composition", () => {
      expect(composePrompt(base, { context: bare, userInput: "hi" })).toBe("hi");
      expect(composePrompt(base, { context: repoOnly, userInput: "hi", repositoryContext: CTX })).toBe(
        "Repository context:\nRepository: octo/app\n\nhi",
      );
    });

    test("own compose function", () => {
      const role: AgentRole = { ...base, compose: ({ userInput }) => `Q: ${userInput}` };
      expect(composePrompt(role, { context: bare, userInput: "hi" })).toBe("Q: hi");
    });
  });
});

describe("role text", () => {
  test("built-in roles use their templates", () => {
    expect(systemPromptFor({ kind: "issue_triage" })).toBe(ROLE_TEMPLATES.issue_triage.systemPrompt);
    expect(describeRole({ kind: "documentation" })).toEqual({
      name: "Documentation Agent",
      description: "Generates and improves documentation",
    });
  });

  test("custom roles carry their own", () => {
    const role: AgentRole = { kind: "custom", name: "Echo", description: "Echoes", systemPrompt: "Echo." };
    expect(systemPromptFor(role)).toBe("Echo.");
    expect(describeRole(role)).toEqual({ name: "Echo", description: "Echoes" });
  });

  test("code review prompt starts with its role line", () => {
    expect(systemPromptFor({ kind: "code_review" }).split("\n")[0]).toBe(
      "You are an expert code reviewer. Your role is to:",
    );
  });
});

describe("createAgentContext", () => {
  test("is frozen and timestamped", () => {
    const context = createAgentContext({ repository: " octo/app ", metadata: { source: "test" } });
    expect(Object.isFrozen(context)).toBe(true);
    expect(Object.isFrozen(context.metadata)).toBe(true);
    expect(context.repository).toBe("octo/app");
    expect(new Date(context.timestamp).toISOString()).toBe(context.timestamp);
  });

  test("rejects non-positive numbers", () => {
    expect(() => createAgentContext({ repository: "octo/app", prNumber: 0 })).toThrow(
      "pr_number must be a positive integer, got 0",
    );
    expect(() => createAgentContext({ repository: "octo/app", issueNumber: 1.5 })).toThrow(ValidationError);
  });

  test("numbers are kept without a repository", () => {
    const context = createAgentContext({ issueNumber: 3, prNumber: 4 });
    expect(context.repository).toBeUndefined();
    expect(context.issueNumber).toBe(3);
    expect(context.prNumber).toBe(4);
  });
});
