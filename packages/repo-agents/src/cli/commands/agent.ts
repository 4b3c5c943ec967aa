import { InvalidArgumentError, type Command } from "commander";
import { createAgentContext, type AgentContext } from "../../agent/context.ts";
import { AgentManager } from "../../agent/manager.ts";
import { loadConfig } from "../../config.ts";
import { createContextFetcher } from "../../github/fetcher.ts";
import { createLogger } from "../../logger.ts";
import { createModelResolver } from "../../models/models.ts";
import { AgentsClient, defaultServerUrl, type ExecuteResult } from "../client.ts";
import { c, formatPairs, outputJson, outputResult } from "../output.ts";

// ── Helpers ────────────────────────────────────────────────────────

interface RemoteOptions {
  url?: string;
  json?: boolean;
}

interface ExecuteOptions extends RemoteOptions {
  id: string;
  input: string;
  repo?: string;
  pr?: number;
  issue?: number;
  local?: boolean;
  type?: string;
  model?: string;
}

function parsePositiveInt(value: string): number {
  const parsed = Number(value);
  if (!Number.isInteger(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Must be a positive integer.");
  }
  return parsed;
}

function clientFor(options: RemoteOptions): AgentsClient {
  return new AgentsClient(options.url ?? defaultServerUrl(loadConfig()));
}

function withServer(command: Command): Command {
  return command
    .option("--url <url>", "Server URL (default: from SERVER_HOST and SERVER_PORT)")
    .option("--json", "Output as JSON");
}

/**
 * Agent type for an id when none is given: the id itself if it names a type,
 * else the longest type the id starts with followed by "_" (code_review_1 →
 * code_review), else the part before the first "_".
 */
export function inferAgentType(id: string, types: readonly string[]): string {
  if (types.includes(id)) return id;
  const prefixed = [...types]
    .sort((a, b) => b.length - a.length)
    .find((type) => id.startsWith(`${type}_`));
  if (prefixed) return prefixed;
  const underscore = id.indexOf("_");
  return underscore > 0 ? id.slice(0, underscore) : id;
}

/** Run one call in-process against a fresh manager */
async function executeLocal(options: ExecuteOptions, context: AgentContext): Promise<ExecuteResult> {
  const config = loadConfig();
  const logger = createLogger({ level: config.logLevel });
  const manager = new AgentManager({
    resolveModel: createModelResolver(config),
    fetcher: createContextFetcher(config),
    logger: logger.child("agents"),
  });

  const type = options.type ?? inferAgentType(options.id, manager.availableTypes());
  manager.create(type, options.id, { model: options.model });
  const response = await manager.execute(options.id, context, options.input);
  return {
    response,
    context: { repository: context.repository ?? null, timestamp: context.timestamp },
  };
}

// ── Commands ───────────────────────────────────────────────────────

export function registerAgentCommands(program: Command) {
  const agent = program.command("agent").description("Create, run and remove agents");

  // ── agent types ────────────────────────────────────────────────
  withServer(agent.command("types"))
    .description("List agent types the server can create")
    .action(async (options: RemoteOptions) => {
      const types = await clientFor(options).agentTypes();
      outputResult(types, options.json, (list) => {
        for (const type of list) console.log(`  - ${type}`);
      });
    });

  // ── agent list ─────────────────────────────────────────────────
  withServer(agent.command("list"))
    .description("List live agents")
    .action(async (options: RemoteOptions) => {
      const agents = await clientFor(options).listAgents();
      outputResult(agents, options.json, (list) => {
        if (list.length === 0) {
          console.log(c.dim("No agents"));
          return;
        }
        for (const { id, type } of list) console.log(`${c.cyan(id)}  ${c.dim(type)}`);
      });
    });

  // ── agent show ─────────────────────────────────────────────────
  withServer(agent.command("show"))
    .description("Show one agent")
    .requiredOption("--id <id>", "Agent id")
    .action(async (options: RemoteOptions & { id: string }) => {
      const info = await clientFor(options).getAgent(options.id);
      outputResult(info, options.json, (data) =>
        console.log(
          formatPairs([
            ["ID", data.id],
            ["Type", data.type],
            ["Name", data.name],
            ["Description", data.description],
            ["Model", data.model],
            ["History", data.keepHistory ? `${data.historyLength} turns` : "off"],
            ["Created", data.createdAt],
          ]),
        ),
      );
    });

  // ── agent create ───────────────────────────────────────────────
  withServer(agent.command("create"))
    .description("Create an agent on the server")
    .requiredOption("--type <type>", "Agent type (see: agent types)")
    .option("--id <id>", "Agent id (default: the type name)")
    .option("--model <model>", "Model identifier (e.g. anthropic:claude-sonnet-4-5)")
    .option("--keep-history", "Send earlier turns with every call")
    .action(
      async (
        options: RemoteOptions & { type: string; id?: string; model?: string; keepHistory?: boolean },
      ) => {
        const created = await clientFor(options).createAgent({
          type: options.type,
          id: options.id,
          model: options.model,
          keep_history: options.keepHistory,
        });
        outputResult(created, options.json, ({ id, type }) =>
          console.log(`${c.green("✓")} Created ${c.cyan(id)} (${type})`),
        );
      },
    );

  // ── agent execute ──────────────────────────────────────────────
  withServer(agent.command("execute"))
    .description("Run one prompt through an agent")
    .requiredOption("--id <id>", "Agent id")
    .requiredOption("--input <text>", "Prompt text")
    .option("--repo <owner/name>", "Repository to pull context from")
    .option("--pr <number>", "Pull request number", parsePositiveInt)
    .option("--issue <number>", "Issue number", parsePositiveInt)
    .option("--local", "Run in this process instead of on the server")
    .option("--type <type>", "Agent type for --local (default: inferred from the id)")
    .option("--model <model>", "Model identifier for --local")
    .addHelpText(
      "after",
      `
Examples:
  $ repo-agents agent execute --id code_review --input "Check error handling" --repo octo/app --pr 42
  $ repo-agents agent execute --local --id issue_triage --input "Crash on startup" --repo octo/app --issue 7`,
    )
    .action(async (options: ExecuteOptions) => {
      const context = createAgentContext({
        repository: options.repo,
        prNumber: options.pr,
        issueNumber: options.issue,
      });

      const result = options.local
        ? await executeLocal(options, context)
        : await clientFor(options).execute(options.id, {
            input: options.input,
            repository: context.repository,
            pr_number: context.prNumber,
            issue_number: context.issueNumber,
          });

      outputResult(result, options.json, ({ response }) => console.log(response));
    });

  // ── agent history ──────────────────────────────────────────────
  withServer(agent.command("history"))
    .description("Show an agent's conversation turns")
    .requiredOption("--id <id>", "Agent id")
    .action(async (options: RemoteOptions & { id: string }) => {
      const history = await clientFor(options).history(options.id);
      outputResult(history, options.json, ({ turns }) => {
        if (turns.length === 0) {
          console.log(c.dim("No history"));
          return;
        }
        for (const turn of turns) {
          console.log(`${c.bold(turn.role)}: ${turn.content}\n`);
        }
      });
    });

  // ── agent clear ────────────────────────────────────────────────
  withServer(agent.command("clear"))
    .description("Forget an agent's conversation")
    .requiredOption("--id <id>", "Agent id")
    .action(async (options: RemoteOptions & { id: string }) => {
      await clientFor(options).clearConversation(options.id);
      if (options.json) {
        outputJson({ ok: true, id: options.id });
      } else {
        console.log(`${c.green("✓")} Cleared conversation for ${c.cyan(options.id)}`);
      }
    });

  // ── agent remove ───────────────────────────────────────────────
  withServer(agent.command("remove"))
    .description("Remove an agent from the server")
    .requiredOption("--id <id>", "Agent id")
    .action(async (options: RemoteOptions & { id: string }) => {
      await clientFor(options).removeAgent(options.id);
      if (options.json) {
        outputJson({ ok: true, id: options.id });
      } else {
        console.log(`${c.green("✓")} Removed ${c.cyan(options.id)}`);
      }
    });
}
