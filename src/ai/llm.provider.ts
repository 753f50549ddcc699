import { LlmProviderName } from "../config/env";
import { Logger } from "../config/logger";
import { AnthropicProvider } from "./providers/anthropic.provider";
import { GeminiProvider } from "./providers/gemini.provider";
import { OpenAiProvider } from "./providers/openai.provider";

export interface LlmProvider {
  readonly name: LlmProviderName;
  getModelName(): string;
  send(prompt: string): Promise<string>;
}

export interface LlmProviderConfig {
  provider: LlmProviderName;
  apiKey: string;
  model?: string;
  maxTokens: number;
}

export const DEFAULT_MODELS: Record<LlmProviderName, string> = {
  openai: "gpt-4o",
  anthropic: "claude-3-5-sonnet-latest",
  gemini: "gemini-1.5-pro",
};

export function createLlmProvider(config: LlmProviderConfig, logger: Logger): LlmProvider {
  const model = config.model || DEFAULT_MODELS[config.provider];
  if (config.provider === "anthropic") {
    return new AnthropicProvider(config.apiKey, model, config.maxTokens, logger);
  }
  if (config.provider === "gemini") {
    return new GeminiProvider(config.apiKey, model, config.maxTokens, logger);
  }
  return new OpenAiProvider(config.apiKey, model, config.maxTokens, logger);
}
