import { describe, expect, test } from "vitest";
import { describeConfig, loadConfig, validateConfig } from "../../src/config.ts";
import { ValidationError } from "../../src/errors.ts";
import { testConfig } from "../helpers/fakes.ts";

describe("loadConfig", () => {
  test("applies defaults to an empty environment", () => {
    expect(loadConfig({})).toEqual({
      githubToken: undefined,
      githubUsername: undefined,
      anthropicApiKey: undefined,
      openaiApiKey: undefined,
      defaultModel: "anthropic:claude-sonnet-4-5",
      maxTokens: 4096,
      temperature: 0.7,
      timeoutMs: 120_000,
      serverHost: "0.0.0.0",
      serverPort: 5000,
      logLevel: "info",
    });
  });

  test("coerces numbers and treats empty secrets as unset", () => {
    const config = loadConfig({ SERVER_PORT: "8080", TEMPERATURE: "0.2", GITHUB_TOKEN: "" });
    expect(config.serverPort).toBe(8080);
    expect(config.temperature).toBe(0.2);
    expect(config.githubToken).toBeUndefined();
  });

  test("rejects invalid values naming the field", () => {
    expect(() => loadConfig({ MAX_TOKENS: "abc" })).toThrow(ValidationError);
    expect(() => loadConfig({ MAX_TOKENS: "abc" })).toThrow(/^Invalid configuration: MAX_TOKENS: /);
  });

  test("rejects unknown log levels", () => {
    expect(() => loadConfig({ LOG_LEVEL: "verbose" })).toThrow(/LOG_LEVEL/);
  });
});

describe("validateConfig", () => {
  test("complete configuration is valid", () => {
    expect(validateConfig(testConfig())).toEqual({ valid: true, missing: [], warnings: [] });
  });

  test("reports GitHub token and the default provider's key", () => {
    const report = validateConfig(testConfig({ githubToken: undefined, anthropicApiKey: undefined }));
    expect(report).toEqual({
      valid: false,
      missing: ["GITHUB_TOKEN", "ANTHROPIC_API_KEY"],
      warnings: [],
    });
  });

  test("checks the key of whichever provider the default model uses", () => {
    const report = validateConfig(testConfig({ defaultModel: "openai:gpt-4o" }));
    expect(report.missing).toEqual(["OPENAI_API_KEY"]);
  });

  test("an unparseable default model is a warning", () => {
    const report = validateConfig(testConfig({ defaultModel: "mystery" }));
    expect(report.valid).toBe(false);
    expect(report.warnings).toEqual([
      "Invalid model identifier: mystery. Expected format: provider:model (e.g., anthropic:claude-sonnet-4-5)",
    ]);
  });
});

describe("describeConfig", () => {
  test("masks secrets", () => {
    const view = Object.fromEntries(
      describeConfig(testConfig({ openaiApiKey: "abc", githubUsername: "octocat" })),
    );
    expect(view["GitHub Token"]).toBe("test****oken");
    expect(view["Anthropic API Key"]).toBe("test****cret");
    expect(view["OpenAI API Key"]).toBe("****");
    expect(view["GitHub Username"]).toBe("octocat");
    expect(view["Server"]).toBe("127.0.0.1:5099");
  });

  test("unset secrets read 'not set'", () => {
    const view = Object.fromEntries(describeConfig(testConfig({ githubToken: undefined })));
    expect(view["GitHub Token"]).toBe("not set");
  });
});
