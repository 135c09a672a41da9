import { createAnthropic } from "@ai-sdk/anthropic";
import { createOpenAICompatible } from "@ai-sdk/openai-compatible";
import { generateText, type LanguageModel } from "ai";
import { emitAgentEvent } from "../pipeline/events.js";
import type { ModelRuntimeConfig } from "../pipeline/types.js";
import { runModelText } from "./model.js";

export interface GenerationResult {
  content: string;
}

export interface GenerateRequest {
  action: string;
  signal?: AbortSignal;
}

/** The generation service boundary: prompt in, text out. */
export interface TextGenerator {
  invoke(prompt: string, request: GenerateRequest): Promise<GenerationResult>;
}

export function createModel(config: ModelRuntimeConfig): LanguageModel {
  emitAgentEvent({
    level: "info",
    eventType: "provider.lifecycle",
    step: "system",
    attempt: 0,
    message: "Model provider initialized",
    phase: "start",
    provider: config.provider,
    modelId: config.modelId,
    baseURLHost: safeHost(config.baseURL),
  });

  if (config.provider === "anthropic") {
    const provider = createAnthropic({
      baseURL: config.baseURL,
      apiKey: config.apiKey,
    });
    return provider(config.modelId);
  }

  const provider = createOpenAICompatible({
    name: "llm",
    baseURL: config.baseURL,
    apiKey: config.apiKey,
  });
  return provider(config.modelId);
}

export class AiTextGenerator implements TextGenerator {
  private model: LanguageModel | undefined;

  constructor(
    private readonly config: ModelRuntimeConfig,
    private readonly maxModelMs: number
  ) {}

  async invoke(prompt: string, request: GenerateRequest): Promise<GenerationResult> {
    const model = this.resolveModel();
    const { text } = await runModelText(
      request.action,
      (abortSignal) =>
        generateText({
          model,
          prompt,
          temperature: this.config.temperature,
          maxRetries: 1,
          abortSignal,
        }),
      { maxModelMs: this.maxModelMs, signal: request.signal }
    );
    return { content: text };
  }

  private resolveModel(): LanguageModel {
    if (!this.model) {
      this.model = createModel(this.config);
    }
    return this.model;
  }
}

export function safeHost(baseURL: string): string {
  try {
    return new URL(baseURL).host.toLowerCase();
  } catch {
    return "invalid-base-url";
  }
}
