import type { ModelInfo } from "../core/schemas/index.js";
import type { GenerateConfig, LLMProvider, ProviderResponse } from "./llm-provider.js";

const SAMPLE_BRANDS = ["Acme", "Globex", "Initech", "Umbrella", "Hooli", "Stark", "Wayne"];

/**
 * MockLLM – a deterministic provider for tests and offline development.
 *
 * The answer depends only on the prompt, so repeated runs produce the
 * same keywords.
 */
export class MockLLM implements LLMProvider {
  readonly name: string;

  constructor(name = "mock") {
    this.name = name;
  }

  async generate(prompt: string, config: GenerateConfig, signal?: AbortSignal): Promise<ProviderResponse> {
    signal?.throwIfAborted();

    const seed = hash(prompt);
    const first = SAMPLE_BRANDS[seed % SAMPLE_BRANDS.length] ?? "Acme";
    const second = SAMPLE_BRANDS[(seed + 3) % SAMPLE_BRANDS.length] ?? "Globex";
    const text = `For "${prompt.slice(0, 80)}" most people pick ${first}, while ${second} is a solid alternative.`;

    return {
      text,
      tokensUsed: text.split(/\s+/).length,
      latencyMs: 0,
      model: config.model,
      provider: this.name,
    };
  }

  async listModels(): Promise<ModelInfo[]> {
    return [{ id: "mock-1", name: "mock-1", description: "Deterministic offline model" }];
  }
}

function hash(text: string): number {
  let h = 0;
  for (let i = 0; i < text.length; i++) {
    h = (h * 31 + text.charCodeAt(i)) >>> 0;
  }
  return h;
}
