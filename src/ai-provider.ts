import { AnthropicProvider } from "./anthropic-provider.js";
import type { AppConfig } from "./config.js";
import type { Logger } from "./logger.js";
import { OpenAIProvider } from "./openai-provider.js";

export type ImageMediaType = "image/png" | "image/jpeg" | "image/gif" | "image/webp";

export type ImageInput = {
  mediaType: ImageMediaType;
  /** Raw base64, no data-URL prefix. */
  data: string;
};

export type CompletionRequest = {
  prompt: string;
  maxTokens: number;
  temperature: number;
  image?: ImageInput;
};

export interface AiProvider {
  readonly name: string;
  complete(request: CompletionRequest): Promise<string>;
}

type ProviderFactories = {
  anthropic: (apiKey: string, model: string) => AiProvider;
  openai: (apiKey: string, model: string) => AiProvider;
};

/**
 * Picks the provider named by `AI_PROVIDER`, else the first one with a key
 * (Anthropic, then OpenAI). Returns null when none is usable.
 */
export function selectAiProvider(
  ai: AppConfig["ai"],
  factories: ProviderFactories,
  log?: Logger,
): AiProvider | null {
  if (ai.provider === "none") {
    return null;
  }
  if (ai.provider === "anthropic" || (!ai.provider && ai.anthropicApiKey)) {
    if (!ai.anthropicApiKey) {
      log?.warn("AI_PROVIDER is anthropic but ANTHROPIC_API_KEY is not set");
      return null;
    }
    return factories.anthropic(ai.anthropicApiKey, ai.anthropicModel);
  }
  if (ai.provider === "openai" || (!ai.provider && ai.openaiApiKey)) {
    if (!ai.openaiApiKey) {
      log?.warn("AI_PROVIDER is openai but OPENAI_API_KEY is not set");
      return null;
    }
    return factories.openai(ai.openaiApiKey, ai.openaiModel);
  }
  return null;
}

export function createAiProvider(ai: AppConfig["ai"], log?: Logger): AiProvider | null {
  const provider = selectAiProvider(
    ai,
    {
      anthropic: (apiKey, model) => new AnthropicProvider(apiKey, model),
      openai: (apiKey, model) => new OpenAIProvider(apiKey, model),
    },
    log,
  );
  log?.info(provider ? `AI provider: ${provider.name}` : "AI provider: none configured");
  return provider;
}
