/**
 * Provider factory – builds an LLMProvider for a stored LLM configuration.
 *
 * OpenAI and OpenAI-compatible backends go through the OpenAI SDK with the
 * configuration's endpoint; "mock" gives the offline MockLLM.
 *
 * Usage:
 *   import { registerProviders } from "../providers/index.js";
 *   registerProviders(registry, await coordinator.getEnabledLLMs());
 */
export { MockLLM } from "./mock-llm.js";
export { OpenAILLM } from "./openai-llm.js";
export { ProviderRegistry } from "./registry.js";
export type { LLMProvider, GenerateConfig, ProviderResponse } from "./llm-provider.js";

import { ConfigurationError } from "../core/errors.js";
import { createLogger, maskApiKey } from "../core/logger.js";
import type { LLMConfig } from "../core/schemas/index.js";
import type { LLMProvider } from "./llm-provider.js";
import { MockLLM } from "./mock-llm.js";
import { OpenAILLM } from "./openai-llm.js";
import type { ProviderRegistry } from "./registry.js";

const logger = createLogger("providers");

/** OpenAI-compatible providers and their default endpoints. */
const OPENAI_COMPATIBLE: Record<string, string | undefined> = {
  openai: undefined,
  ollama: "http://localhost:11434/v1",
  perplexity: "https://api.perplexity.ai",
  deepseek: "https://api.deepseek.com",
  openrouter: "https://openrouter.ai/api/v1",
};

export function supportedProviders(): string[] {
  return [...Object.keys(OPENAI_COMPATIBLE), "mock"].sort();
}

export function createLLMProvider(llm: LLMConfig): LLMProvider {
  if (llm.provider === "mock") {
    return new MockLLM();
  }

  if (llm.provider in OPENAI_COMPATIBLE) {
    const baseUrl = llm.baseUrl ?? OPENAI_COMPATIBLE[llm.provider];
    // Ollama ignores the key but the SDK insists on one.
    const apiKey = llm.apiKey ?? (llm.provider === "ollama" ? "ollama" : undefined);
    if (apiKey === undefined && llm.provider !== "openai") {
      throw new ConfigurationError(`LLM ${llm.name} has no API key for provider ${llm.provider}`);
    }
    return new OpenAILLM({ apiKey, baseUrl, name: llm.provider });
  }

  throw new ConfigurationError(
    `Unsupported provider "${llm.provider}" for LLM ${llm.name}. Supported: ${supportedProviders().join(", ")}`,
  );
}

/**
 * Register one provider per LLM configuration, replacing earlier entries.
 * Configurations that cannot be built are reported and skipped.
 */
export function registerProviders(
  registry: ProviderRegistry,
  llms: LLMConfig[],
): { registered: string[]; failed: Array<{ llmId: string; error: string }> } {
  const registered: string[] = [];
  const failed: Array<{ llmId: string; error: string }> = [];

  for (const llm of llms) {
    try {
      registry.register(llm.provider, createLLMProvider(llm));
      registered.push(llm.provider);
      logger.debug({ llm: llm.name, provider: llm.provider, apiKey: maskApiKey(llm.apiKey) }, "Provider ready");
    } catch (error) {
      const message = error instanceof Error ? error.message : "Unknown error";
      logger.error({ llm: llm.name, provider: llm.provider, error: message }, "Provider setup failed");
      failed.push({ llmId: llm.id, error: message });
    }
  }

  return { registered, failed };
}
