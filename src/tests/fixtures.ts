import type { GenerateConfig, LLMProvider, ProviderResponse } from "../providers/llm-provider.js";
import type { LLMConfig, ModelInfo, Prompt, Response, Schedule } from "../core/schemas/index.js";

export const T0 = "2024-01-01T00:00:00.000Z";

export function makePrompt(id: string, overrides: Partial<Prompt> = {}): Prompt {
  return {
    id,
    template: `Which tool is best for ${id}?`,
    tags: [],
    enabled: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeLLM(id: string, overrides: Partial<LLMConfig> = {}): LLMConfig {
  return {
    id,
    name: `LLM ${id}`,
    provider: "scripted",
    model: "test-model",
    config: {},
    enabled: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

export function makeResponse(id: string, overrides: Partial<Response> = {}): Response {
  return {
    id,
    promptId: "p1",
    promptText: "Which tool is best?",
    llmId: "l1",
    llmName: "LLM l1",
    llmProvider: "scripted",
    llmModel: "test-model",
    responseText: "",
    tokensUsed: 10,
    latencyMs: 5,
    temperature: 0.7,
    attempts: 1,
    createdAt: T0,
    ...overrides,
  };
}

export function makeSchedule(id: string, overrides: Partial<Schedule> = {}): Schedule {
  return {
    id,
    name: `Schedule ${id}`,
    promptIds: ["p1"],
    llmIds: ["l1"],
    cronExpr: "0 9 * * *",
    temperature: 0.5,
    enabled: true,
    createdAt: T0,
    updatedAt: T0,
    ...overrides,
  };
}

/** One scripted outcome: a text answer, a thrown error or an embedded error payload. */
export type Step = string | Error | { error: string };

export interface ProviderCall {
  prompt: string;
  config: GenerateConfig;
}

/**
 * Provider that replays scripted steps in order and then answers with
 * `fallback`. Calls can be held open with `hold()` to observe concurrency.
 */
export class ScriptedProvider implements LLMProvider {
  readonly calls: ProviderCall[] = [];
  inFlight = 0;
  maxInFlight = 0;
  private readonly steps: Step[];
  private gate: Promise<void> | undefined;
  private openGate: (() => void) | undefined;

  constructor(
    readonly name = "scripted",
    steps: Step[] = [],
    private readonly fallback = "Acme is great",
  ) {
    this.steps = [...steps];
  }

  hold(): void {
    this.gate = new Promise<void>((resolve) => {
      this.openGate = resolve;
    });
  }

  release(): void {
    this.openGate?.();
    this.gate = undefined;
  }

  async generate(prompt: string, config: GenerateConfig, signal?: AbortSignal): Promise<ProviderResponse> {
    this.calls.push({ prompt, config });
    this.inFlight++;
    this.maxInFlight = Math.max(this.maxInFlight, this.inFlight);
    try {
      if (this.gate) await this.gate;
      signal?.throwIfAborted();
      const step = this.steps.shift() ?? this.fallback;
      if (step instanceof Error) throw step;
      if (typeof step === "object") {
        return { text: "", tokensUsed: 0, latencyMs: 1, model: config.model, provider: this.name, error: step.error };
      }
      return { text: step, tokensUsed: 12, latencyMs: 7, model: config.model, provider: this.name };
    } finally {
      this.inFlight--;
    }
  }

  async listModels(): Promise<ModelInfo[]> {
    return [];
  }
}

/** Sleep that resolves immediately and records every requested delay. */
export function recordingSleep(): { sleep: (ms: number) => Promise<void>; delays: number[] } {
  const delays: number[] = [];
  return {
    delays,
    sleep: async (ms: number) => {
      delays.push(ms);
    },
  };
}

/** Clock that advances one second per reading. */
export function tickingClock(start = T0): () => Date {
  let t = Date.parse(start);
  return () => {
    const now = new Date(t);
    t += 1000;
    return now;
  };
}
