// Agents: roles, execution, registry
export { Agent, type AgentDescriptor, type AgentInfo, type AgentInit } from "./agent/agent.ts";
export { createAgentContext, type AgentContext, type AgentContextInit } from "./agent/context.ts";
export {
  AgentManager,
  type AgentFactory,
  type AgentManagerDeps,
  type CreateAgentOptions,
} from "./agent/manager.ts";
export { BUILTIN_AGENT_TYPES, ROLE_TEMPLATES, type BuiltinAgentType } from "./agent/prompts.ts";
export {
  builtinRole,
  composePrompt,
  describeRole,
  systemPromptFor,
  type AgentRole,
  type ComposeInput,
  type PromptComposer,
} from "./agent/roles.ts";

// Models
export { LanguageModelClient } from "./models/client.ts";
export {
  createModelClient,
  createModelResolver,
  resolveModelId,
  SUPPORTED_PROVIDERS,
  type ModelResolver,
  type SupportedProvider,
} from "./models/models.ts";
export type { GenerationSettings, ModelClient, Turn } from "./models/types.ts";

// GitHub
export { createOctokitApi, type GitHubApi } from "./github/api.ts";
export {
  createContextFetcher,
  GitHubContextFetcher,
  parseRepository,
  UnconfiguredContextFetcher,
  type ContextFetcher,
  type ContextRequest,
} from "./github/fetcher.ts";

// Server
export { createApp, type AppDeps } from "./daemon/app.ts";
export { startServer, type RunningServer, type StartServerOptions } from "./daemon/server.ts";
export { startHttpServer, type ServerHandle } from "./daemon/serve.ts";

// Ambient
export { describeConfig, loadConfig, validateConfig, type Config } from "./config.ts";
export * from "./errors.ts";
export { createLogger, createSilentLogger, type Logger, type LogLevel } from "./logger.ts";
