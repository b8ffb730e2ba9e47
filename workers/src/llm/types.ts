/**
 * LLM Provider Types
 *
 * Abstractions for OpenAI-compatible chat providers (generic endpoint, Ollama).
 */

/**
 * Chat message format (OpenAI-compatible)
 */
export interface ChatMessage {
  role: "system" | "user" | "assistant";
  content: string;
}

/**
 * Chat request options
 */
export interface ChatRequestOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
  /** Skip cache lookup/write for this request */
  skipCache?: boolean;
  /** Cache folder prefix (e.g. "header-inference") */
  cachePrefix?: string;
  /** Aborts the underlying HTTP request */
  signal?: AbortSignal;
  /** JSON response format for structured outputs */
  responseFormat?: {
    type: "json_schema" | "json_object";
    json_schema?: {
      name: string;
      strict?: boolean;
      schema: Record<string, unknown>;
    };
  };
}

/**
 * Chat response
 */
export interface ChatResponse {
  content: string;
  model: string;
  usage?: {
    promptTokens: number;
    completionTokens: number;
    totalTokens: number;
  };
  cached?: boolean;
}

/**
 * LLM Provider interface
 */
export interface LLMProvider {
  name: string;

  text(
    systemPrompt: string,
    userPrompt: string,
    options?: ChatRequestOptions,
  ): Promise<ChatResponse>;
}

export const PROVIDERS = ["generic", "ollama"] as const;

export type ProviderName = (typeof PROVIDERS)[number];

/**
 * Text model configuration
 */
export interface ModelConfig {
  provider: ProviderName;
  endpoint: string;
  model: string;
  numCtx: number;
}

/**
 * Global LLM configuration
 */
export interface LLMConfig {
  cache: {
    enabled: boolean;
    dir: string;
    /** Entries older than this are ignored; 0 keeps entries forever */
    maxAgeMs: number;
  };
  text: ModelConfig;
}

function parseProvider(value: string | undefined): ProviderName {
  return PROVIDERS.find((p) => p === value) ?? "generic";
}

/**
 * Get default configuration from environment
 */
export function getDefaultConfig(): LLMConfig {
  const cacheEnabled = process.env.LLM_CACHE_ENABLED === "true";
  const cacheDir = process.env.LLM_CACHE_DIR || "./cache";
  const cacheMaxAgeMs = parseInt(process.env.LLM_CACHE_MAX_AGE_MS || "0", 10);
  const numCtx = parseInt(process.env.LLM_NUM_CTX || "8192", 10);

  const provider = parseProvider(process.env.LLM_TEXT_PROVIDER);
  const model =
    process.env.LLM_TEXT_MODEL ||
    (provider === "ollama" ? "qwen2.5:14b" : "gpt-4o-mini");
  const endpoint =
    process.env.LLM_TEXT_ENDPOINT ||
    (provider === "ollama"
      ? "http://localhost:11434/v1/chat/completions"
      : "https://api.openai.com/v1/chat/completions");

  return {
    cache: {
      enabled: cacheEnabled,
      dir: cacheDir,
      maxAgeMs: Number.isNaN(cacheMaxAgeMs) ? 0 : cacheMaxAgeMs,
    },
    text: {
      provider,
      endpoint,
      model,
      numCtx,
    },
  };
}
