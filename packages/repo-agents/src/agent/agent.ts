/**
 * Agent — a named role bound to a model client.
 *
 * execute() fetches GitHub context when the call names a repository, composes
 * the prompt for the role, and returns the model text unchanged. Failures
 * from the fetcher or the model propagate as-is; a failed fetch means the
 * model is never called.
 */

import type { ContextFetcher } from "../github/fetcher.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import type { ModelClient, Turn } from "../models/types.ts";
import type { AgentContext } from "./context.ts";
import { composePrompt, describeRole, systemPromptFor, type AgentRole } from "./roles.ts";

export interface AgentDescriptor {
  type: string;
  id: string;
}

export interface AgentInfo extends AgentDescriptor {
  name: string;
  description: string;
  model: string;
  keepHistory: boolean;
  historyLength: number;
  createdAt: string;
}

export interface AgentInit {
  id: string;
  type: string;
  role: AgentRole;
  model: ModelClient;
  fetcher: ContextFetcher;
  /** Keep user/assistant turns and send them with every call (default: false) */
  keepHistory?: boolean;
  logger?: Logger;
}

export class Agent {
  readonly id: string;
  readonly type: string;
  readonly role: AgentRole;
  readonly keepHistory: boolean;
  readonly createdAt: string;

  private model: ModelClient;
  private fetcher: ContextFetcher;
  private log: Logger;
  private turns: Turn[] = [];
  /** Tail of the execute chain; one call runs at a time */
  private tail: Promise<void> = Promise.resolve();

  constructor(init: AgentInit) {
    this.id = init.id;
    this.type = init.type;
    this.role = init.role;
    this.model = init.model;
    this.fetcher = init.fetcher;
    this.keepHistory = init.keepHistory ?? false;
    this.log = init.logger ?? createSilentLogger();
    this.createdAt = new Date().toISOString();
  }

  get name(): string {
    return describeRole(this.role).name;
  }

  get systemPrompt(): string {
    return systemPromptFor(this.role);
  }

  execute(context: AgentContext, userInput: string): Promise<string> {
    const run = this.tail.then(() => this.run(context, userInput));
    // The caller observes failures through `run`; the chain only orders calls
    this.tail = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  /** Read-only copy of the conversation so far */
  history(): Turn[] {
    return this.turns.map((turn) => ({ ...turn }));
  }

  clearHistory(): void {
    this.turns = [];
  }

  descriptor(): AgentDescriptor {
    return { type: this.type, id: this.id };
  }

  info(): AgentInfo {
    const { name, description } = describeRole(this.role);
    return {
      type: this.type,
      id: this.id,
      name,
      description,
      model: this.model.model,
      keepHistory: this.keepHistory,
      historyLength: this.turns.length,
      createdAt: this.createdAt,
    };
  }

  private async run(context: AgentContext, userInput: string): Promise<string> {
    let repositoryContext: string | undefined;
    if (context.repository) {
      this.log.debug(`Fetching context for ${context.repository}`);
      repositoryContext = await this.fetcher.fetch({
        repository: context.repository,
        issueNumber: context.issueNumber,
        prNumber: context.prNumber,
      });
    }

    const prompt = composePrompt(this.role, { context, userInput, repositoryContext });
    const system = this.systemPrompt;

    if (!this.keepHistory) {
      return this.model.generate(prompt, system);
    }

    const userTurn: Turn = { role: "user", content: prompt };
    const response = await this.model.chat([...this.turns, userTurn], system);
    this.turns.push(userTurn, { role: "assistant", content: response });
    return response;
  }
}
