/**
 * Environment configuration.
 *
 * Parsed once from process.env (after dotenv has loaded .env) and then passed
 * explicitly to whatever needs it. Nothing reads process.env after startup.
 */

import { z } from "zod";
import { ValidationError } from "./errors.ts";
import { LOG_LEVELS, type LogLevel } from "./logger.ts";
import { providerKeyFor, resolveModelId } from "./models/models.ts";

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => (value ? value : undefined));

const envSchema = z.object({
  GITHUB_TOKEN: optionalSecret,
  GITHUB_USERNAME: optionalSecret,
  ANTHROPIC_API_KEY: optionalSecret,
  OPENAI_API_KEY: optionalSecret,
  DEFAULT_MODEL: z.string().min(1).default("anthropic:claude-sonnet-4-5"),
  MAX_TOKENS: z.coerce.number().int().positive().default(4096),
  TEMPERATURE: z.coerce.number().min(0).max(2).default(0.7),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(120_000),
  SERVER_HOST: z.string().min(1).default("0.0.0.0"),
  SERVER_PORT: z.coerce.number().int().min(0).max(65535).default(5000),
  LOG_LEVEL: z.enum(LOG_LEVELS).default("info"),
});

export interface Config {
  githubToken?: string;
  githubUsername?: string;
  anthropicApiKey?: string;
  openaiApiKey?: string;
  /** Model identifier used when an agent does not name one */
  defaultModel: string;
  maxTokens: number;
  temperature: number;
  /** Per-request model timeout */
  timeoutMs: number;
  serverHost: string;
  serverPort: number;
  logLevel: LogLevel;
}

export function loadConfig(env: Record<string, string | undefined> = process.env): Config {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const fields = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${fields.join("; ")}`);
  }
  const e = parsed.data;
  return {
    githubToken: e.GITHUB_TOKEN,
    githubUsername: e.GITHUB_USERNAME,
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    openaiApiKey: e.OPENAI_API_KEY,
    defaultModel: e.DEFAULT_MODEL,
    maxTokens: e.MAX_TOKENS,
    temperature: e.TEMPERATURE,
    timeoutMs: e.MODEL_TIMEOUT_MS,
    serverHost: e.SERVER_HOST,
    serverPort: e.SERVER_PORT,
    logLevel: e.LOG_LEVEL,
  };
}

export interface ConfigReport {
  valid: boolean;
  /** Required settings that are absent */
  missing: string[];
  warnings: string[];
}

/**
 * Check that the configuration can serve requests: a GitHub token, and an API
 * key for the provider of the default model.
 */
export function validateConfig(config: Config): ConfigReport {
  const missing: string[] = [];
  const warnings: string[] = [];

  if (!config.githubToken) missing.push("GITHUB_TOKEN");

  try {
    const { provider } = resolveModelId(config.defaultModel);
    const key = providerKeyFor(provider);
    if (!config[key.field]) missing.push(key.envVar);
  } catch (error) {
    warnings.push(error instanceof Error ? error.message : String(error));
  }

  return { valid: missing.length === 0 && warnings.length === 0, missing, warnings };
}

function mask(value: string | undefined): string {
  if (!value) return "not set";
  if (value.length <= 8) return "****";
  return value.slice(0, 4) + "****" + value.slice(-4);
}

/** Printable view of the configuration with secrets masked */
export function describeConfig(config: Config): Array<[label: string, value: string]> {
  return [
    ["GitHub Token", mask(config.githubToken)],
    ["GitHub Username", config.githubUsername ?? "not set"],
    ["Anthropic API Key", mask(config.anthropicApiKey)],
    ["OpenAI API Key", mask(config.openaiApiKey)],
    ["Default Model", config.defaultModel],
    ["Max Tokens", String(config.maxTokens)],
    ["Temperature", String(config.temperature)],
    ["Model Timeout", `${config.timeoutMs}ms`],
    ["Server", `${config.serverHost}:${config.serverPort}`],
    ["Log Level", config.logLevel],
  ];
}
