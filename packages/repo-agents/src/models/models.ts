import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAI } from "@ai-sdk/openai";
import type { LanguageModel } from "ai";
import type { Config } from "../config.ts";
import { MissingCredentialError, ValidationError } from "../errors.ts";
import { LanguageModelClient } from "./client.ts";
import type { ModelClient } from "./types.ts";

/** Config field and environment variable holding a provider's API key */
export interface ProviderKey {
  field: "anthropicApiKey" | "openaiApiKey";
  envVar: string;
}

interface ProviderEntry {
  key: ProviderKey;
  description: string;
  /** Default model when only the provider is named */
  defaultModel: string;
  create: (apiKey: string) => (modelName: string) => LanguageModel;
}

export const SUPPORTED_PROVIDERS = ["anthropic", "openai"] as const;

export type SupportedProvider = (typeof SUPPORTED_PROVIDERS)[number];

/**
 * Provider name → constructor. Resolved from configuration; adding a
 * provider means adding an entry here.
 */
const PROVIDERS: Record<SupportedProvider, ProviderEntry> = {
  anthropic: {
    key: { field: "anthropicApiKey", envVar: "ANTHROPIC_API_KEY" },
    description: "Anthropic Claude",
    defaultModel: "claude-sonnet-4-5",
    create: (apiKey) => {
      const provider = createAnthropic({ apiKey });
      return (modelName) => provider(modelName);
    },
  },
  openai: {
    key: { field: "openaiApiKey", envVar: "OPENAI_API_KEY" },
    description: "OpenAI GPT",
    defaultModel: "gpt-4o",
    create: (apiKey) => {
      const provider = createOpenAI({ apiKey });
      return (modelName) => provider(modelName);
    },
  },
};

const PROVIDER_ALIASES: Record<string, SupportedProvider> = {
  claude: "anthropic",
  gpt: "openai",
};

/** Bare model names whose provider can be inferred */
const MODEL_PREFIXES: Array<[prefix: string, provider: SupportedProvider]> = [
  ["claude-", "anthropic"],
  ["gpt-", "openai"],
  ["o1", "openai"],
  ["o3", "openai"],
  ["o4", "openai"],
];

function isSupportedProvider(name: string): name is SupportedProvider {
  return SUPPORTED_PROVIDERS.some((provider) => provider === name);
}

function normalizeProvider(name: string): SupportedProvider | undefined {
  const lower = name.toLowerCase();
  if (isSupportedProvider(lower)) return lower;
  return PROVIDER_ALIASES[lower];
}

export interface ResolvedModelId {
  provider: SupportedProvider;
  modelName: string;
}

/**
 * Parse a model identifier.
 *
 * Supports four formats:
 * - provider:model-name   anthropic:claude-sonnet-4-5, openai:gpt-4o
 * - provider/model-name   anthropic/claude-sonnet-4-5
 * - provider              anthropic → its default model
 * - model-name            claude-sonnet-4-5, gpt-4o (provider inferred)
 */
export function resolveModelId(modelId: string): ResolvedModelId {
  const id = modelId.trim();
  const separator = id.search(/[:/]/);

  if (separator !== -1) {
    const providerName = id.slice(0, separator);
    const modelName = id.slice(separator + 1);
    const provider = normalizeProvider(providerName);
    if (!provider) {
      throw new ValidationError(
        `Unknown provider: ${providerName}. Supported: ${SUPPORTED_PROVIDERS.join(", ")}`,
      );
    }
    if (!modelName) {
      throw new ValidationError(`Invalid model identifier: ${modelId}. Model name is required.`);
    }
    return { provider, modelName };
  }

  const provider = normalizeProvider(id);
  if (provider) {
    return { provider, modelName: PROVIDERS[provider].defaultModel };
  }

  const inferred = MODEL_PREFIXES.find(([prefix]) => id.toLowerCase().startsWith(prefix));
  if (inferred) {
    return { provider: inferred[1], modelName: id };
  }

  throw new ValidationError(
    `Invalid model identifier: ${modelId}. Expected format: provider:model (e.g., anthropic:claude-sonnet-4-5)`,
  );
}

export function providerKeyFor(provider: SupportedProvider): ProviderKey {
  return PROVIDERS[provider].key;
}

/**
 * Build a ModelClient for a model identifier.
 * @throws MissingCredentialError when the provider's API key is not configured
 */
export function createModelClient(modelId: string, config: Config): ModelClient {
  const { provider, modelName } = resolveModelId(modelId);
  const entry = PROVIDERS[provider];
  const apiKey = config[entry.key.field];
  if (!apiKey) {
    throw new MissingCredentialError(entry.key.envVar);
  }

  return new LanguageModelClient({
    model: `${provider}:${modelName}`,
    languageModel: entry.create(apiKey)(modelName),
    settings: {
      maxTokens: config.maxTokens,
      temperature: config.temperature,
      timeoutMs: config.timeoutMs,
    },
    label: entry.description,
  });
}

/** Returns the client for a model identifier (default model when omitted) */
export type ModelResolver = (modelId?: string) => ModelClient;

/** Clients kept by a resolver; the oldest is dropped past this */
const MAX_CACHED_CLIENTS = 16;

/**
 * Resolver that builds each model's client once and reuses it. Identifiers
 * are normalized first, so "claude" and "anthropic:claude-sonnet-4-5" share a
 * client.
 */
export function createModelResolver(
  config: Config,
  create: (modelId: string, config: Config) => ModelClient = createModelClient,
): ModelResolver {
  const clients = new Map<string, ModelClient>();
  return (modelId = config.defaultModel) => {
    const { provider, modelName } = resolveModelId(modelId);
    const key = `${provider}:${modelName}`;
    const cached = clients.get(key);
    if (cached) return cached;

    const client = create(key, config);
    if (clients.size >= MAX_CACHED_CLIENTS) {
      const oldest = clients.keys().next();
      if (!oldest.done) clients.delete(oldest.value);
    }
    clients.set(key, client);
    return client;
  };
}
