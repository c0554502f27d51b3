import type { ModelInfo } from "../core/schemas/index.js";

/** Generation parameters passed to a provider call. */
export interface GenerateConfig {
  model: string;
  temperature: number;
  maxTokens: number;
  topP?: number;
  topK?: number;
}

export interface ProviderResponse {
  text: string;
  tokensUsed: number;
  latencyMs: number;
  model: string;
  provider: string;
  /** Set when the provider answered but reported a failure in its payload. */
  error?: string;
  /** Citation URLs attached by providers with web-search grounding. */
  groundingSources?: string[];
}

/**
 * LLMProvider interface – plug in any LLM backend.
 * Registered by name in the ProviderRegistry; the coordinator never
 * switches on provider names.
 */
export interface LLMProvider {
  readonly name: string;

  /**
   * Send one prompt and return the raw completion.
   * Rejects on transport or API failure; must honour `signal`.
   */
  generate(prompt: string, config: GenerateConfig, signal?: AbortSignal): Promise<ProviderResponse>;

  /** List text-generation models available with the given credential. */
  listModels(apiKey?: string, baseUrl?: string): Promise<ModelInfo[]>;
}
