import { generateText, type LanguageModel, type ModelMessage } from "ai";
import { classifyUpstreamError, ValidationError } from "../errors.ts";
import type { GenerationSettings, ModelClient, Turn } from "./types.ts";

/**
 * ModelClient backed by an AI SDK language model.
 *
 * The SDK's own retry loop is disabled: a failed call surfaces immediately,
 * classified into the error taxonomy.
 */
export class LanguageModelClient implements ModelClient {
  readonly model: string;

  private languageModel: LanguageModel;
  private settings: GenerationSettings;
  private label: string;

  constructor(config: {
    model: string;
    languageModel: LanguageModel;
    settings: GenerationSettings;
    /** Provider name used in error messages */
    label?: string;
  }) {
    this.model = config.model;
    this.languageModel = config.languageModel;
    this.settings = config.settings;
    this.label = config.label ?? "Provider";
  }

  async generate(prompt: string, systemPrompt?: string): Promise<string> {
    if (!prompt.trim()) {
      throw new ValidationError("Prompt must not be empty");
    }
    return this.complete([{ role: "user", content: prompt }], systemPrompt);
  }

  async chat(turns: readonly Turn[], systemPrompt?: string): Promise<string> {
    const last = turns.at(-1);
    if (!last) {
      throw new ValidationError("Chat requires at least one turn");
    }
    if (last.role !== "user" || !last.content.trim()) {
      throw new ValidationError("Chat must end with a non-empty user turn");
    }
    return this.complete(turns, systemPrompt);
  }

  private async complete(turns: readonly Turn[], systemPrompt?: string): Promise<string> {
    const messages: ModelMessage[] = turns.map((turn) =>
      turn.role === "user"
        ? { role: "user", content: turn.content }
        : { role: "assistant", content: turn.content },
    );

    try {
      const result = await generateText({
        model: this.languageModel,
        system: systemPrompt || undefined,
        messages,
        maxOutputTokens: this.settings.maxTokens,
        temperature: this.settings.temperature,
        maxRetries: 0,
        abortSignal: AbortSignal.timeout(this.settings.timeoutMs),
      });
      return result.text;
    } catch (error) {
      throw classifyUpstreamError(error, this.label);
    }
  }
}
