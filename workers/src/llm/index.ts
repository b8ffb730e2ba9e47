/**
 * LLM client used by the header resolver's last tier.
 * Connects to the configured text provider (generic OpenAI-compatible
 * endpoint or Ollama) and manages the response cache transparently.
 */

import type {
  LLMProvider,
  ChatRequestOptions,
  ChatResponse,
  LLMConfig,
  ModelConfig,
} from "./types.js";
import { getDefaultConfig } from "./types.js";
import { GenericProvider } from "./providers/generic.js";
import { OllamaProvider } from "./providers/ollama.js";
import { LLMCache } from "./cache.js";

/**
 * Instantiates the provider named in the model configuration.
 */
export function createProvider(modelConfig: ModelConfig): LLMProvider {
  switch (modelConfig.provider) {
    case "ollama":
      return new OllamaProvider(
        modelConfig.endpoint,
        modelConfig.model,
        modelConfig.numCtx,
      );
    case "generic":
    default:
      if (!process.env.LLM_API_KEY) {
        throw new Error("LLM_API_KEY is required for the generic provider");
      }
      return new GenericProvider(
        modelConfig.endpoint,
        modelConfig.model,
        process.env.LLM_API_KEY,
      );
  }
}

export class LLMClient {
  private textProvider: LLMProvider;
  private cache: LLMCache | null;
  private config: LLMConfig;

  constructor(config?: Partial<LLMConfig>, provider?: LLMProvider) {
    this.config = { ...getDefaultConfig(), ...config };
    this.textProvider = provider ?? createProvider(this.config.text);
    this.cache = this.config.cache.enabled
      ? new LLMCache(this.config.cache.dir, this.config.cache.maxAgeMs)
      : null;
  }

  /**
   * Executes a text chat request, answering from the cache when possible.
   */
  async chat(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse> {
    const model = options?.model || this.config.text.model;
    const prefix = options?.cachePrefix || "chat";
    const useCache = this.cache !== null && !options?.skipCache;

    if (this.cache && useCache) {
      const cached = await this.cache.get(
        { systemPrompt, userPrompt },
        model,
        prefix,
      );
      if (cached) {
        console.log(`[LLMClient] Cache hit for model ${model} (${prefix})`);
        return cached;
      }
    }

    const response = await this.textProvider.text(systemPrompt, userPrompt, {
      ...options,
      model,
    });

    if (this.cache && useCache) {
      await this.cache.set({ systemPrompt, userPrompt }, model, response, prefix);
    }

    return response;
  }
}

export type { ChatMessage, ChatResponse, ChatRequestOptions } from "./types.js";
