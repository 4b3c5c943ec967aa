/**
 * REST API — Hono routes over an AgentManager.
 *
 * Every route is a thin wrapper: validate body → call the manager → return
 * JSON. Errors thrown by the manager reach onError unchanged and are mapped
 * to a status code there, nowhere else.
 */

import { Hono, type Context } from "hono";
import { cors } from "hono/cors";
import { z } from "zod";
import { createAgentContext } from "../agent/context.ts";
import type { AgentManager } from "../agent/manager.ts";
import { toHttpError, ValidationError } from "../errors.ts";
import { createSilentLogger, type Logger } from "../logger.ts";

export interface AppDeps {
  manager: AgentManager;
  logger?: Logger;
  /** Epoch ms (default: now) */
  startedAt?: number;
}

// ── Request bodies ─────────────────────────────────────────────────

const createAgentBody = z.object({
  type: z.string().min(1),
  id: z.string().min(1).optional(),
  model: z.string().min(1).optional(),
  keep_history: z.boolean().optional(),
});

const executeBody = z.object({
  input: z.string().min(1),
  repository: z.string().min(1).optional(),
  pr_number: z.number().int().positive().optional(),
  issue_number: z.number().int().positive().optional(),
  metadata: z.record(z.unknown()).optional(),
});

export type CreateAgentBody = z.infer<typeof createAgentBody>;
export type ExecuteBody = z.infer<typeof executeBody>;

async function readBody<T extends z.ZodTypeAny>(c: Context, schema: T): Promise<z.infer<T>> {
  let raw: unknown;
  try {
    raw = await c.req.json();
  } catch {
    throw new ValidationError("Request body must be valid JSON");
  }
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => {
      const path = issue.path.join(".");
      return path ? `${path}: ${issue.message}` : issue.message;
    });
    throw new ValidationError(`Invalid request: ${fields.join("; ")}`);
  }
  return parsed.data;
}

// ── App ────────────────────────────────────────────────────────────

export function createApp(deps: AppDeps): Hono {
  const { manager } = deps;
  const log = deps.logger ?? createSilentLogger();
  const startedAt = deps.startedAt ?? Date.now();

  const app = new Hono();
  app.use("*", cors());

  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    log.info(`${c.req.method} ${c.req.path} ${c.res.status} ${Date.now() - start}ms`);
  });

  app.onError((error, c) => {
    const { status, body } = toHttpError(error);
    if (status >= 500) {
      log.error(`${c.req.method} ${c.req.path} failed:`, error);
    }
    return c.json(body, status);
  });

  // ── Health ──

  app.get("/health", (c) =>
    c.json({
      status: "ok",
      agents: manager.list().length,
      uptime: Math.floor((Date.now() - startedAt) / 1000),
    }),
  );

  // ── Types ──

  app.get("/agent-types", (c) => c.json({ types: manager.availableTypes() }));

  // ── Agents ──

  app.get("/agents", (c) => c.json(manager.list()));

  app.post("/agents", async (c) => {
    const body = await readBody(c, createAgentBody);
    const agent = manager.create(body.type, body.id, {
      model: body.model,
      keepHistory: body.keep_history,
    });
    return c.json(agent.descriptor(), 201);
  });

  app.get("/agents/:id", (c) => c.json(manager.get(c.req.param("id")).info()));

  app.delete("/agents/:id", (c) => {
    manager.remove(c.req.param("id"));
    return c.json({ ok: true });
  });

  // ── Execution ──

  app.post("/agents/:id/execute", async (c) => {
    const id = c.req.param("id");
    // Unknown ids answer 404 whatever the body holds
    manager.get(id);
    const body = await readBody(c, executeBody);
    const context = createAgentContext({
      repository: body.repository,
      prNumber: body.pr_number,
      issueNumber: body.issue_number,
      metadata: body.metadata,
    });

    const response = await manager.execute(id, context, body.input);
    return c.json({
      response,
      context: { repository: context.repository ?? null, timestamp: context.timestamp },
    });
  });

  // ── Conversation ──

  app.get("/agents/:id/history", (c) => {
    const id = c.req.param("id");
    return c.json({ id, turns: manager.history(id) });
  });

  app.delete("/agents/:id/conversation", (c) => {
    manager.clearHistory(c.req.param("id"));
    return c.json({ ok: true });
  });

  return app;
}
