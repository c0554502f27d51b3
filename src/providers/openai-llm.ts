import OpenAI from "openai";
import { ConfigurationError, ProviderError } from "../core/errors.js";
import type { ModelInfo } from "../core/schemas/index.js";
import type { GenerateConfig, LLMProvider, ProviderResponse } from "./llm-provider.js";

/** Model families the models endpoint lists that cannot generate text. */
const NON_TEXT_MODEL = /embedding|whisper|tts|dall-e|moderation|transcribe|image|audio|realtime/i;

export interface OpenAILLMOptions {
  apiKey?: string;
  /** OpenAI-compatible endpoint (Ollama, Perplexity, vLLM…). */
  baseUrl?: string;
  /** Registry name, defaults to "openai". */
  name?: string;
}

/**
 * OpenAI LLM provider – connects to any OpenAI-compatible chat endpoint.
 *
 * Reads OPENAI_API_KEY from environment when no key is passed, but only under
 * the "openai" name; other endpoints must be given their own key.
 */
export class OpenAILLM implements LLMProvider {
  readonly name: string;
  private readonly client: OpenAI;
  private readonly apiKey: string;
  private readonly baseUrl: string | undefined;

  constructor(options: OpenAILLMOptions = {}) {
    this.name = options.name ?? "openai";
    const apiKey = options.apiKey ?? (this.name === "openai" ? process.env["OPENAI_API_KEY"] : undefined);
    if (!apiKey) {
      throw new ConfigurationError(
        this.name === "openai"
          ? "OPENAI_API_KEY is required. Set it in .env or on the LLM configuration."
          : `API key is required for provider ${this.name}`,
      );
    }

    this.apiKey = apiKey;
    this.baseUrl = options.baseUrl;
    this.client = new OpenAI({ apiKey, baseURL: options.baseUrl });
  }

  async generate(
    prompt: string,
    config: GenerateConfig,
    signal?: AbortSignal,
  ): Promise<ProviderResponse> {
    const startedAt = performance.now();
    const response = await this.client.chat.completions.create(
      {
        model: config.model,
        messages: [{ role: "user", content: prompt }],
        temperature: config.temperature,
        max_tokens: config.maxTokens,
        ...(config.topP !== undefined ? { top_p: config.topP } : {}),
      },
      { signal },
    );
    const latencyMs = Math.round(performance.now() - startedAt);

    const content = response.choices[0]?.message?.content;
    if (!content) {
      throw new ProviderError(`${this.name} returned an empty response`, { retryable: true });
    }

    return {
      text: content,
      tokensUsed: response.usage?.total_tokens ?? 0,
      latencyMs,
      model: response.model,
      provider: this.name,
      groundingSources: readCitations(response),
    };
  }

  async listModels(apiKey?: string, baseUrl?: string): Promise<ModelInfo[]> {
    const client =
      apiKey !== undefined || (baseUrl !== undefined && baseUrl !== this.baseUrl)
        ? new OpenAI({
            apiKey: apiKey ?? this.apiKey,
            baseURL: baseUrl ?? this.baseUrl,
          })
        : this.client;

    const page = await client.models.list();
    return page.data
      .filter((m) => !NON_TEXT_MODEL.test(m.id))
      .map((m) => ({ id: m.id, name: m.id, description: `Owned by ${m.owned_by}` }))
      .sort((a, b) => a.id.localeCompare(b.id));
  }
}

/** Perplexity-style `citations` array on the completion payload. */
function readCitations(response: object): string[] | undefined {
  if (!("citations" in response) || !Array.isArray(response.citations)) {
    return undefined;
  }
  const sources = response.citations.filter((c): c is string => typeof c === "string");
  return sources.length > 0 ? sources : undefined;
}
