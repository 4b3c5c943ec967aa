/**
 * AgentManager — type registry and live-instance registry.
 *
 * Constructed explicitly and handed to the CLI or the HTTP app; there is no
 * process-wide instance. Registry reads and writes are synchronous, so no two
 * requests can interleave between a membership check and an insert.
 */

import {
  AgentNotFoundError,
  DuplicateAgentError,
  UnknownAgentTypeError,
  ValidationError,
} from "../errors.ts";
import type { ContextFetcher } from "../github/fetcher.ts";
import { createSilentLogger, type Logger } from "../logger.ts";
import type { ModelResolver } from "../models/models.ts";
import type { Turn } from "../models/types.ts";
import { Agent, type AgentDescriptor, type AgentInfo } from "./agent.ts";
import type { AgentContext } from "./context.ts";
import { BUILTIN_AGENT_TYPES } from "./prompts.ts";
import { builtinRole, type AgentRole } from "./roles.ts";

export interface CreateAgentOptions {
  /** Model identifier; the resolver's default when omitted */
  model?: string;
  keepHistory?: boolean;
}

/** Builds the role for a new agent of a registered type */
export type AgentFactory = (options: CreateAgentOptions) => AgentRole;

export interface AgentManagerDeps {
  resolveModel: ModelResolver;
  fetcher: ContextFetcher;
  logger?: Logger;
}

const AGENT_ID_RE = /^[\w.-]+$/;

export class AgentManager {
  private factories = new Map<string, AgentFactory>();
  private agents = new Map<string, Agent>();
  private resolveModel: ModelResolver;
  private fetcher: ContextFetcher;
  private log: Logger;

  constructor(deps: AgentManagerDeps) {
    this.resolveModel = deps.resolveModel;
    this.fetcher = deps.fetcher;
    this.log = deps.logger ?? createSilentLogger();

    for (const type of BUILTIN_AGENT_TYPES) {
      this.registerType(type, () => builtinRole(type));
    }
  }

  // ── Types ──────────────────────────────────────────────────────────

  /** Add or replace an agent type */
  registerType(name: string, factory: AgentFactory): void {
    if (!name.trim()) {
      throw new ValidationError("Agent type name must not be empty");
    }
    this.factories.set(name, factory);
  }

  availableTypes(): string[] {
    return [...this.factories.keys()];
  }

  // ── Instances ──────────────────────────────────────────────────────

  /**
   * Create and register an agent. The id defaults to the type name.
   * Nothing is registered when construction fails.
   */
  create(type: string, id: string = type, options: CreateAgentOptions = {}): Agent {
    const factory = this.factories.get(type);
    if (!factory) {
      throw new UnknownAgentTypeError(type, this.availableTypes());
    }
    if (!AGENT_ID_RE.test(id)) {
      throw new ValidationError(
        `Invalid agent id: "${id}". Use letters, digits, "_", "-" or "."`,
      );
    }
    if (this.agents.has(id)) {
      throw new DuplicateAgentError(id);
    }

    const agent = new Agent({
      id,
      type,
      role: factory(options),
      model: this.resolveModel(options.model),
      fetcher: this.fetcher,
      keepHistory: options.keepHistory,
      logger: this.log.child(id),
    });
    this.agents.set(id, agent);
    this.log.debug(`Created agent ${id} (${type}, ${agent.info().model})`);
    return agent;
  }

  get(id: string): Agent {
    const agent = this.agents.get(id);
    if (!agent) throw new AgentNotFoundError(id);
    return agent;
  }

  has(id: string): boolean {
    return this.agents.has(id);
  }

  /** Live agents in creation order */
  list(): AgentDescriptor[] {
    return [...this.agents.values()].map((agent) => agent.descriptor());
  }

  describe(): AgentInfo[] {
    return [...this.agents.values()].map((agent) => agent.info());
  }

  /** Run one agent call. Errors propagate untranslated. */
  async execute(id: string, context: AgentContext, userInput: string): Promise<string> {
    return this.get(id).execute(context, userInput);
  }

  remove(id: string): void {
    if (!this.agents.delete(id)) {
      throw new AgentNotFoundError(id);
    }
    this.log.debug(`Removed agent ${id}`);
  }

  history(id: string): Turn[] {
    return this.get(id).history();
  }

  clearHistory(id: string): void {
    this.get(id).clearHistory();
  }
}
