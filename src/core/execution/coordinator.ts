import { v4 as uuidv4 } from "uuid";
import { createLogger } from "../logger.js";
import {
  AbortedError,
  ConfigurationError,
  ExecutionFailedError,
  ProviderError,
  StorageError,
  classifyProviderError,
  errorMessage,
  toConfigurationError,
} from "../errors.js";
import {
  ExecutionConfigSchema,
  RANDOM_TEMPERATURE,
  ScheduleTemperatureSchema,
  defaultExecutionConfig,
  type ExecutionConfig,
  type ExecutionError,
  type ExecutionResult,
  type LLMConfig,
  type Prompt,
  type Response,
  type ScheduleTemperature,
} from "../schemas/index.js";
import type { Store } from "../store/store.js";
import type { GenerateConfig, LLMProvider, ProviderResponse } from "../../providers/llm-provider.js";
import type { ProviderRegistry } from "../../providers/registry.js";
import { ProviderRateLimits, type RateLimit } from "./rateLimiter.js";
import { delay, runPool, type Sleep } from "./workerPool.js";

const logger = createLogger("execution-coordinator");

export const DEFAULT_MAX_TOKENS = 1000;
export const DEFAULT_CONCURRENCY = 4;

export interface ExecutionCoordinatorConfig {
  store: Store;
  registry: ProviderRegistry;
  /** Worker pool size for batch runs (default 4). */
  concurrency?: number;
  /** Used when a call passes no ExecutionConfig. */
  defaults?: ExecutionConfig;
  sleep?: Sleep;
  /** Per-provider call pacing; unlimited when absent. */
  rateLimit?: RateLimit;
  /** Source of random temperatures, uniform in [0, 1). */
  random?: () => number;
  now?: () => Date;
}

export interface ProviderLookup {
  get(name: string): LLMProvider | undefined;
}

export interface ExecuteOptions {
  signal?: AbortSignal;
  scheduleId?: string;
  /** Providers to resolve against instead of the live registry. */
  providers?: ProviderLookup;
}

export interface RunOptions extends ExecuteOptions {
  concurrency?: number;
  scheduleName?: string;
  /** Overrides the config temperature; "random" draws one value per prompt. */
  temperature?: ScheduleTemperature;
  /** Skip prompts that already have at least one stored response. */
  newOnly?: boolean;
}

interface Pair {
  prompt: Prompt;
  llm: LLMConfig;
  temperature: number;
}

/**
 * Execution Coordinator
 *
 * Runs a (prompt, LLM) pair to completion:
 *   provider lookup → up to maxRetries+1 attempts with a fixed delay →
 *   exactly one persisted Response (success or terminal failure).
 *
 * Batch runs fan the prompt × LLM product out over a bounded worker pool
 * and keep going when a pair fails.
 */
export class ExecutionCoordinator {
  private readonly store: Store;
  private readonly registry: ProviderRegistry;
  private readonly concurrency: number;
  private readonly defaults: ExecutionConfig;
  private readonly sleep: Sleep;
  private readonly rateLimits: ProviderRateLimits | undefined;
  private readonly random: () => number;
  private readonly now: () => Date;

  constructor(config: ExecutionCoordinatorConfig) {
    this.store = config.store;
    this.registry = config.registry;
    this.concurrency = config.concurrency ?? DEFAULT_CONCURRENCY;
    this.defaults = config.defaults ?? defaultExecutionConfig();
    this.sleep = config.sleep ?? delay;
    this.random = config.random ?? Math.random;
    this.now = config.now ?? (() => new Date());
    this.rateLimits = config.rateLimit
      ? new ProviderRateLimits(config.rateLimit, this.sleep, () => this.now().getTime())
      : undefined;
  }

  getDefaults(): ExecutionConfig {
    return { ...this.defaults };
  }

  async getEnabledPrompts(): Promise<Prompt[]> {
    return this.store.listPrompts(true);
  }

  async getEnabledLLMs(): Promise<LLMConfig[]> {
    return this.store.listLLMs(true);
  }

  /**
   * Keep only prompts without any stored response.
   * Two concurrent runs can both see "no response yet"; this is a coarse
   * filter, not a lock.
   */
  async filterNewPrompts(prompts: Prompt[]): Promise<Prompt[]> {
    const answered = await Promise.all(
      prompts.map(async (p) => (await this.store.listResponses({ promptId: p.id, limit: 1 })).length > 0),
    );
    return prompts.filter((_, i) => !answered[i]);
  }

  async executePromptWithLLM(
    prompt: Prompt,
    llm: LLMConfig,
    config?: ExecutionConfig,
    options: ExecuteOptions = {},
  ): Promise<Response> {
    const execConfig = this.validate(config ?? this.defaults);
    const { signal } = options;

    const provider = (options.providers ?? this.registry).get(llm.provider);
    if (!provider) {
      throw new ConfigurationError(`LLM provider ${llm.provider} not found`);
    }

    const generateConfig = buildGenerateConfig(llm, execConfig.temperature);
    const maxAttempts = execConfig.maxRetries + 1;
    let lastError: ProviderError | undefined;
    let lastLatencyMs = 0;
    let attempts = 0;

    for (let attempt = 1; attempt <= maxAttempts; attempt++) {
      throwIfAborted(signal);
      await this.rateLimits?.for(llm.provider).acquire(signal);
      attempts = attempt;
      logger.debug(
        { promptId: prompt.id, llm: llm.name, attempt, maxAttempts },
        "Calling provider",
      );

      const startedAt = performance.now();
      let result: ProviderResponse;
      try {
        result = await provider.generate(prompt.template, generateConfig, signal);
      } catch (error) {
        throwIfAborted(signal);
        lastError = classifyProviderError(error);
        lastLatencyMs = Math.round(performance.now() - startedAt);
        logger.warn(
          { promptId: prompt.id, llm: llm.name, attempt, maxAttempts, retryable: lastError.retryable, error: lastError.message },
          "Attempt failed",
        );
        if (!lastError.retryable) break;
        if (attempt < maxAttempts) {
          await this.sleep(execConfig.retryDelayMs, signal);
        }
        continue;
      }

      if (result.error) {
        // The provider answered with an error payload: permanent.
        lastError = new ProviderError(`LLM error: ${result.error}`, { retryable: false });
        lastLatencyMs = result.latencyMs;
        logger.warn({ promptId: prompt.id, llm: llm.name, attempt, error: result.error }, "Provider reported an error");
        break;
      }

      const response = this.buildResponse(prompt, llm, execConfig.temperature, attempts, options.scheduleId, {
        responseText: result.text,
        tokensUsed: result.tokensUsed,
        latencyMs: result.latencyMs > 0 ? result.latencyMs : Math.round(performance.now() - startedAt),
        groundingSources: result.groundingSources,
      });
      await this.persist(response);
      if (attempt > 1) {
        logger.info({ promptId: prompt.id, llm: llm.name, attempt }, "Succeeded after retry");
      }
      return response;
    }

    const reason = lastError?.message ?? "Unknown error";
    const failed = this.buildResponse(prompt, llm, execConfig.temperature, attempts, options.scheduleId, {
      responseText: "",
      tokensUsed: 0,
      latencyMs: lastLatencyMs,
      error: reason,
    });
    await this.persist(failed);
    logger.error({ promptId: prompt.id, llm: llm.name, attempts, error: reason }, "All attempts failed");
    throw new ExecutionFailedError(
      `Prompt ${prompt.id} with LLM ${llm.name} failed after ${attempts} attempt(s): ${reason}`,
      failed,
      { cause: lastError },
    );
  }

  /**
   * Execute every prompt with every LLM. Per-pair failures are collected,
   * never thrown; cancellation skips pairs not yet started.
   */
  async runOnce(
    prompts: Prompt[],
    llms: LLMConfig[],
    config?: ExecutionConfig,
    options: RunOptions = {},
  ): Promise<ExecutionResult> {
    const execConfig = this.validate(config ?? this.defaults);
    const runId = uuidv4();
    const startedAt = this.now();
    const scheduleName = options.scheduleName ?? "Manual Execution";

    const temperature = ScheduleTemperatureSchema.safeParse(options.temperature ?? execConfig.temperature);
    if (!temperature.success) {
      throw toConfigurationError(temperature.error, "Invalid temperature");
    }

    const selected = options.newOnly ? await this.filterNewPrompts(prompts) : prompts;
    const pairs = this.buildPairs(selected, llms, temperature.data);

    // Registrations made while this run is in flight do not affect it.
    const providers = this.registry.snapshot();

    logger.info(
      { runId, scheduleId: options.scheduleId, prompts: selected.length, llms: llms.length, total: pairs.length },
      "Run started",
    );

    const outcomes = await runPool(
      pairs,
      options.concurrency ?? this.concurrency,
      (pair) =>
        this.executePromptWithLLM(pair.prompt, pair.llm, { ...execConfig, temperature: pair.temperature }, {
          signal: options.signal,
          scheduleId: options.scheduleId,
          providers,
        }),
      options.signal,
    );

    const responses: Response[] = [];
    const errors: ExecutionError[] = [];
    let skipped = 0;

    outcomes.forEach((outcome, i) => {
      const pair = pairs[i];
      if (!pair) return;
      if (outcome.status === "fulfilled") {
        responses.push(outcome.value);
      } else if (outcome.status === "skipped" || outcome.reason instanceof AbortedError) {
        skipped++;
      } else {
        errors.push({ promptId: pair.prompt.id, llmId: pair.llm.id, error: errorMessage(outcome.reason) });
      }
    });

    const completedAt = this.now();
    const result: ExecutionResult = {
      runId,
      scheduleId: options.scheduleId,
      scheduleName,
      totalExecutions: pairs.length,
      successfulExecutions: responses.length,
      failedExecutions: errors.length,
      skippedExecutions: skipped,
      responses,
      errors,
      startedAt: startedAt.toISOString(),
      completedAt: completedAt.toISOString(),
      durationMs: Math.max(0, completedAt.getTime() - startedAt.getTime()),
    };

    logger.info(
      { runId, total: result.totalExecutions, succeeded: result.successfulExecutions, failed: result.failedExecutions, skipped },
      "Run completed",
    );
    return result;
  }

  /** Run all enabled prompts with all enabled LLMs. */
  async runAllEnabled(config?: ExecutionConfig, options: RunOptions = {}): Promise<ExecutionResult> {
    const [prompts, llms] = await Promise.all([this.getEnabledPrompts(), this.getEnabledLLMs()]);
    if (prompts.length === 0) throw new ConfigurationError("No enabled prompts found");
    if (llms.length === 0) throw new ConfigurationError("No enabled LLMs found");
    return this.runOnce(prompts, llms, config, options);
  }

  // ── Helpers ───────────────────────────────────────────────────────

  /** One temperature per prompt, shared by all of its LLMs. */
  private buildPairs(prompts: Prompt[], llms: LLMConfig[], temperature: ScheduleTemperature): Pair[] {
    return prompts.flatMap((prompt) => {
      const value = temperature === RANDOM_TEMPERATURE ? this.random() : temperature;
      return llms.map((llm) => ({ prompt, llm, temperature: value }));
    });
  }

  private validate(config: ExecutionConfig): ExecutionConfig {
    const parsed = ExecutionConfigSchema.safeParse(config);
    if (!parsed.success) {
      throw toConfigurationError(parsed.error, "Invalid execution config");
    }
    return parsed.data;
  }

  private buildResponse(
    prompt: Prompt,
    llm: LLMConfig,
    temperature: number,
    attempts: number,
    scheduleId: string | undefined,
    outcome: Pick<Response, "responseText" | "tokensUsed" | "latencyMs" | "error" | "groundingSources">,
  ): Response {
    return {
      id: uuidv4(),
      promptId: prompt.id,
      promptText: prompt.template,
      llmId: llm.id,
      llmName: llm.name,
      llmProvider: llm.provider,
      llmModel: llm.model,
      temperature,
      attempts,
      scheduleId,
      ...outcome,
      createdAt: this.now().toISOString(),
    };
  }

  private async persist(response: Response): Promise<void> {
    try {
      await this.store.createResponse(response);
    } catch (error) {
      throw new StorageError(`Failed to save response: ${errorMessage(error)}`, { cause: error });
    }
  }
}

/**
 * Generation parameters for an LLM: the run temperature and default token
 * budget, overridden by parseable entries of the LLM's config map.
 */
export function buildGenerateConfig(llm: LLMConfig, temperature: number): GenerateConfig {
  const config: GenerateConfig = { model: llm.model, temperature, maxTokens: DEFAULT_MAX_TOKENS };
  const overrides = llm.config;

  const t = parseNumber(overrides["temperature"]);
  if (t !== undefined) config.temperature = t;

  const maxTokens = parseInteger(overrides["max_tokens"]);
  if (maxTokens !== undefined && maxTokens >= 1) config.maxTokens = maxTokens;

  const topP = parseNumber(overrides["top_p"]);
  if (topP !== undefined) config.topP = topP;

  const topK = parseInteger(overrides["top_k"]);
  if (topK !== undefined) config.topK = topK;

  return config;
}

function parseNumber(value: string | undefined): number | undefined {
  if (value === undefined || value.trim() === "") return undefined;
  const n = Number(value);
  return Number.isFinite(n) ? n : undefined;
}

function parseInteger(value: string | undefined): number | undefined {
  const n = parseNumber(value);
  return n !== undefined && Number.isInteger(n) ? n : undefined;
}

function throwIfAborted(signal?: AbortSignal): void {
  if (signal?.aborted) {
    throw new AbortedError("Execution cancelled");
  }
}
