/**
 * REST API Tests
 *
 * Tests the Hono app created by createApp() using app.request().
 * No real HTTP server is started; requests go straight through the router.
 */

import { beforeEach, describe, expect, test } from "vitest";
import { AgentManager } from "../../src/agent/manager.ts";
import { createApp } from "../../src/daemon/app.ts";
import { NotFoundError, RateLimitedError, TimeoutError } from "../../src/errors.ts";
import type { ModelClient } from "../../src/models/types.ts";
import { EchoModel, FailingModel, FakeFetcher } from "../helpers/fakes.ts";

// ── Test Helpers ──────────────────────────────────────────────────

function setup(options: { model?: ModelClient; fetcher?: FakeFetcher } = {}) {
  const model = options.model ?? new EchoModel();
  const fetcher = options.fetcher ?? new FakeFetcher("Repository: octo/app");
  const manager = new AgentManager({ resolveModel: () => model, fetcher });
  const app = createApp({ manager });
  return { app, manager, model, fetcher };
}

function post(app: ReturnType<typeof createApp>, path: string, body: unknown) {
  return app.request(path, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: typeof body === "string" ? body : JSON.stringify(body),
  });
}

// ── Health and types ──────────────────────────────────────────────

describe("GET /health", () => {
  test("reports ok", async () => {
    const { app } = setup();
    const res = await app.request("/health");
    expect(res.status).toBe(200);
    const data = await res.json();
    expect(data.status).toBe("ok");
    expect(data.agents).toBe(0);
  });
});

test("GET /agent-types lists registered types", async () => {
  const { app } = setup();
  const res = await app.request("/agent-types");
  expect(await res.json()).toEqual({ types: ["code_review", "issue_triage", "documentation"] });
});

// ── Agent lifecycle ───────────────────────────────────────────────

describe("agents", () => {
  let ctx: ReturnType<typeof setup>;

  beforeEach(() => {
    ctx = setup();
  });

  test("POST /agents creates and returns the descriptor", async () => {
    const res = await post(ctx.app, "/agents", { type: "code_review", id: "cr1" });
    expect(res.status).toBe(201);
    expect(await res.json()).toEqual({ type: "code_review", id: "cr1" });
    expect(ctx.manager.has("cr1")).toBe(true);
  });

  test("POST /agents without id uses the type name", async () => {
    const res = await post(ctx.app, "/agents", { type: "documentation" });
    expect(await res.json()).toEqual({ type: "documentation", id: "documentation" });
  });

  test("duplicate id → 409", async () => {
    await post(ctx.app, "/agents", { type: "code_review", id: "cr1" });
    const res = await post(ctx.app, "/agents", { type: "code_review", id: "cr1" });
    expect(res.status).toBe(409);
    expect(await res.json()).toEqual({ error: "Agent already exists: cr1", code: "duplicate_agent" });
  });

  test("unknown type → 400", async () => {
    const res = await post(ctx.app, "/agents", { type: "nope" });
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Unknown agent type: nope. Available: code_review, issue_triage, documentation",
      code: "unknown_agent_type",
    });
  });

  test("missing type → 400", async () => {
    const res = await post(ctx.app, "/agents", {});
    expect(res.status).toBe(400);
    expect((await res.json()).code).toBe("validation_error");
  });

  test("invalid JSON → 400", async () => {
    const res = await post(ctx.app, "/agents", "not json");
    expect(res.status).toBe(400);
    expect(await res.json()).toEqual({
      error: "Request body must be valid JSON",
      code: "validation_error",
    });
  });

  test("GET /agents lists in creation order", async () => {
    await post(ctx.app, "/agents", { type: "code_review", id: "a" });
    await post(ctx.app, "/agents", { type: "documentation", id: "b" });

    const res = await ctx.app.request("/agents");
    expect(await res.json()).toEqual([
      { type: "code_review", id: "a" },
      { type: "documentation", id: "b" },
    ]);
  });

  test("GET /agents/:id returns agent info", async () => {
    await post(ctx.app, "/agents", { type: "code_review", id: "cr1", keep_history: true });

    const res = await ctx.app.request("/agents/cr1");
    expect(res.status).toBe(200);
    const info = await res.json();
    expect(info.name).toBe("Code Review Agent");
    expect(info.model).toBe("test:echo");
    expect(info.keepHistory).toBe(true);
    expect(info.historyLength).toBe(0);
  });

  test("GET /agents/:id unknown → 404", async () => {
    const res = await ctx.app.request("/agents/missing");
    expect(res.status).toBe(404);
    expect(await res.json()).toEqual({ error: "Agent not found: missing", code: "agent_not_found" });
  });

  test("DELETE /agents/:id removes once", async () => {
    await post(ctx.app, "/agents", { type: "code_review", id: "cr1" });

    const res = await ctx.app.request("/agents/cr1", { method: "DELETE" });
    expect(await res.json()).toEqual({ ok: true });

    const again = await ctx.app.request("/agents/cr1", { method: "DELETE" });
    expect(again.status).toBe(404);
  });
});

// ── Execution ─────────────────────────────────────────────────────

describe("POST /agents/:id/execute", () => {
  test("returns the model text and the call context", async () => {
    const { app, manager } = setup();
    manager.create("code_review", "cr1");

    const res = await post(app, "/agents/cr1/execute", { input: "Review this: def add(a,b): return a+b" });
    expect(res.status).toBe(200);
    const data = await res.json();
    expect(data.response).toBe("Review this code:\n\nReview this: def add(a,b): return a+b");
    expect(data.context.repository).toBeNull();
    expect(typeof data.context.timestamp).toBe("string");
  });

  test("repository and PR number reach the fetcher", async () => {
    const { app, manager, fetcher } = setup();
    manager.create("code_review", "cr1");

    const res = await post(app, "/agents/cr1/execute", {
      input: "Check errors",
      repository: "octo/app",
      pr_number: 42,
    });
    const data = await res.json();

    expect(fetcher.requests).toEqual([{ repository: "octo/app", issueNumber: undefined, prNumber: 42 }]);
    expect(data.response).toBe(
      "Please review the following pull request:\n\nRepository: octo/app\n\nAdditional context: Check errors\n\nProvide a comprehensive code review.",
    );
    expect(data.context.repository).toBe("octo/app");
  });

  test.each([
    { input: "hi" },
    { input: "" },
    {},
    { input: "hi", pr_number: 3 },
    { input: "hi", repository: "bad" },
  ])("unknown agent → 404 for %j", async (body) => {
    const { app } = setup();
    const res = await post(app, "/agents/ghost/execute", body);
    expect(res.status).toBe(404);
    expect((await res.json()).code).toBe("agent_not_found");
  });

  test("empty input → 400", async () => {
    const { app, manager } = setup();
    manager.create("code_review", "cr1");
    const res = await post(app, "/agents/cr1/execute", { input: "" });
    expect(res.status).toBe(400);
  });

  test("PR number without repository runs without GitHub context", async () => {
    const { app, manager, fetcher } = setup();
    manager.create("code_review", "cr1");
    const res = await post(app, "/agents/cr1/execute", { input: "hi", pr_number: 3 });
    expect(res.status).toBe(200);
    const data = await res.json();
    expect(data.response).toBe("Review this code:\n\nhi");
    expect(data.context.repository).toBeNull();
    expect(fetcher.requests).toEqual([]);
  });

  test("GitHub not found → 502 and no model call", async () => {
    const model = new EchoModel();
    const { app, manager } = setup({
      model,
      fetcher: new FakeFetcher(new NotFoundError("GitHub repository octo/gone not found or not accessible")),
    });
    manager.create("code_review", "cr1");

    const res = await post(app, "/agents/cr1/execute", { input: "hi", repository: "octo/gone" });
    expect(res.status).toBe(502);
    expect(await res.json()).toEqual({
      error: "GitHub repository octo/gone not found or not accessible",
      code: "not_found",
    });
    expect(model.calls).toHaveLength(0);
  });

  test("rate limited → 429", async () => {
    const { app, manager } = setup({ model: new FailingModel(new RateLimitedError("slow down")) });
    manager.create("code_review", "cr1");
    const res = await post(app, "/agents/cr1/execute", { input: "hi" });
    expect(res.status).toBe(429);
  });

  test("timeout → 504", async () => {
    const { app, manager } = setup({ model: new FailingModel(new TimeoutError("too slow")) });
    manager.create("code_review", "cr1");
    const res = await post(app, "/agents/cr1/execute", { input: "hi" });
    expect(res.status).toBe(504);
  });

  test("unexpected failure → 500 internal_error", async () => {
    const { app, manager } = setup({ model: new FailingModel(new Error("bug")) });
    manager.create("code_review", "cr1");
    const res = await post(app, "/agents/cr1/execute", { input: "hi" });
    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({ error: "bug", code: "internal_error" });
  });
});

// ── Conversation ──────────────────────────────────────────────────

test("history is readable and clearable", async () => {
  const { app, manager } = setup();
  manager.create("documentation", "docs", { keepHistory: true });
  await post(app, "/agents/docs/execute", { input: "one" });

  const history = await (await app.request("/agents/docs/history")).json();
  expect(history).toEqual({
    id: "docs",
    turns: [
      { role: "user", content: "Generate documentation for:\n\none" },
      { role: "assistant", content: "Generate documentation for:\n\none" },
    ],
  });

  const cleared = await app.request("/agents/docs/conversation", { method: "DELETE" });
  expect(await cleared.json()).toEqual({ ok: true });
  expect((await (await app.request("/agents/docs/history")).json()).turns).toEqual([]);
});
