import { createLogger } from "../logger.js";
import { NotFoundError, errorMessage } from "../errors.js";
import { CatalogService } from "../catalog/catalogService.js";
import { ExecutionCoordinator, type RunOptions } from "../execution/coordinator.js";
import type { RateLimit } from "../execution/rateLimiter.js";
import type { Sleep } from "../execution/workerPool.js";
import { ExclusionList } from "../keywords/exclusionList.js";
import { upcomingRuns } from "../scheduler/cron.js";
import { Scheduler, type SchedulerStatus } from "../scheduler/scheduler.js";
import { ScheduleService } from "../scheduler/scheduleService.js";
import { StatsAggregator } from "../stats/statsService.js";
import { FileStore } from "../store/fileStore.js";
import type { Store } from "../store/store.js";
import type {
  ExecutionConfig,
  ExecutionResult,
  LLMConfig,
  ModelInfo,
  Prompt,
  Response,
  Schedule,
} from "../schemas/index.js";
import { ProviderRegistry, createLLMProvider, registerProviders } from "../../providers/index.js";
import type { AppConfig } from "../../config/index.js";

const logger = createLogger("monitor");

export interface GeoMonitorConfig {
  store: Store;
  registry: ProviderRegistry;
  exclusions: ExclusionList;
  concurrency?: number;
  executionConfig?: ExecutionConfig;
  tickIntervalMs?: number;
  /** Register a provider whenever the catalog creates or enables an LLM. */
  autoRegisterProviders?: boolean;
  /** Per-provider call pacing; unlimited when absent. */
  rateLimit?: RateLimit;
  sleep?: Sleep;
  random?: () => number;
  now?: () => Date;
}

export interface ScheduleDetail {
  schedule: Schedule;
  running: boolean;
  /** Next due times, empty for a disabled schedule or an unparseable cron. */
  upcomingRuns: string[];
}

export interface ManualRunOptions extends Pick<RunOptions, "newOnly" | "temperature" | "signal"> {
  maxRetries?: number;
  retryDelayMs?: number;
}

/**
 * GeoMonitor
 *
 * Wires the store, provider registry, execution coordinator, scheduler,
 * exclusion list, catalog and stats aggregator together. Every collaborator is
 * passed in or built here; nothing is global.
 */
export class GeoMonitor {
  readonly store: Store;
  readonly registry: ProviderRegistry;
  readonly exclusions: ExclusionList;
  readonly coordinator: ExecutionCoordinator;
  readonly scheduler: Scheduler;
  readonly schedules: ScheduleService;
  readonly catalog: CatalogService;
  readonly stats: StatsAggregator;
  private readonly autoRegisterProviders: boolean;
  private readonly now: () => Date;

  constructor(config: GeoMonitorConfig) {
    this.store = config.store;
    this.now = config.now ?? (() => new Date());
    this.registry = config.registry;
    this.exclusions = config.exclusions;
    this.autoRegisterProviders = config.autoRegisterProviders ?? false;

    this.coordinator = new ExecutionCoordinator({
      store: config.store,
      registry: config.registry,
      concurrency: config.concurrency,
      defaults: config.executionConfig,
      sleep: config.sleep,
      rateLimit: config.rateLimit,
      random: config.random,
      now: config.now,
    });
    this.scheduler = new Scheduler({
      store: config.store,
      coordinator: this.coordinator,
      tickIntervalMs: config.tickIntervalMs,
      executionConfig: config.executionConfig,
      now: config.now,
    });
    this.schedules = new ScheduleService(config.store, config.now);
    this.catalog = new CatalogService(config.store, config.now, (llm) => this.syncProvider(llm));
    this.stats = new StatsAggregator({ store: config.store, exclusions: config.exclusions });
  }

  getEnabledPrompts(): Promise<Prompt[]> {
    return this.coordinator.getEnabledPrompts();
  }

  getEnabledLLMs(): Promise<LLMConfig[]> {
    return this.coordinator.getEnabledLLMs();
  }

  executeNow(scheduleId: string): Promise<ExecutionResult> {
    return this.scheduler.executeNow(scheduleId);
  }

  runOnce(
    prompts: Prompt[],
    llms: LLMConfig[],
    config?: ExecutionConfig,
    options?: RunOptions,
  ): Promise<ExecutionResult> {
    return this.coordinator.runOnce(prompts, llms, config, options);
  }

  /** Every enabled prompt with every enabled LLM, with optional overrides. */
  runEnabled(options: ManualRunOptions = {}): Promise<ExecutionResult> {
    const defaults = this.coordinator.getDefaults();
    return this.coordinator.runAllEnabled(
      {
        ...defaults,
        maxRetries: options.maxRetries ?? defaults.maxRetries,
        retryDelayMs: options.retryDelayMs ?? defaults.retryDelayMs,
      },
      { newOnly: options.newOnly, temperature: options.temperature, signal: options.signal },
    );
  }

  async scheduleDetail(id: string, count = 5): Promise<ScheduleDetail> {
    const schedule = await this.schedules.getSchedule(id);
    let runs: Date[] = [];
    if (schedule.enabled) {
      try {
        runs = upcomingRuns(schedule.cronExpr, this.now(), count);
      } catch (error) {
        logger.warn({ scheduleId: id, error: errorMessage(error) }, "Schedule cannot be planned");
      }
    }
    return {
      schedule,
      running: this.scheduler.isRunning(id),
      upcomingRuns: runs.map((d) => d.toISOString()),
    };
  }

  /** Models offered by the endpoint an LLM config points at. */
  async listModels(llmId: string): Promise<ModelInfo[]> {
    const llm = await this.store.getLLM(llmId);
    if (!llm) {
      throw new NotFoundError(`LLM ${llmId} not found`);
    }
    return createLLMProvider(llm).listModels();
  }

  async getResponse(id: string): Promise<Response> {
    const response = await this.store.getResponse(id);
    if (!response) {
      throw new NotFoundError(`Response ${id} not found`);
    }
    return response;
  }

  /** Delete every stored response, resetting all statistics. */
  async clearResponses(): Promise<number> {
    const deleted = await this.store.deleteAllResponses();
    logger.info({ deleted }, "Responses cleared");
    return deleted;
  }

  reloadExclusionWords(): Promise<number> {
    return this.exclusions.reload();
  }

  start(): void {
    this.scheduler.start();
  }

  stop(): Promise<void> {
    return this.scheduler.stop();
  }

  status(): SchedulerStatus {
    return this.scheduler.status();
  }

  /**
   * Register one provider per enabled stored LLM. Runs already in flight
   * keep the providers they started with.
   */
  async refreshProviders(): Promise<void> {
    const llms = await this.store.listLLMs(true);
    this.register(llms);
  }

  private syncProvider(llm: LLMConfig): void {
    if (!this.autoRegisterProviders || !llm.enabled) return;
    this.register([llm]);
  }

  private register(llms: LLMConfig[]): void {
    const { failed } = registerProviders(this.registry, llms);
    if (failed.length > 0) {
      logger.warn({ failed }, "Some providers could not be registered");
    }
  }
}

/** Build a file-backed monitor from application config. */
export async function createMonitor(config: AppConfig): Promise<GeoMonitor> {
  const store = new FileStore(config.dataDir);
  await store.initialize();

  const exclusions = new ExclusionList(config.exclusionFile);
  await exclusions.reload();

  const monitor = new GeoMonitor({
    store,
    registry: new ProviderRegistry(),
    exclusions,
    concurrency: config.workerConcurrency,
    executionConfig: {
      temperature: config.defaultTemperature,
      maxRetries: config.maxRetries,
      retryDelayMs: config.retryDelayMs,
    },
    tickIntervalMs: config.tickIntervalMs,
    autoRegisterProviders: true,
    rateLimit:
      config.requestsPerMinute > 0
        ? { requestsPerMinute: config.requestsPerMinute, burst: config.rateLimitBurst }
        : undefined,
  });
  await monitor.refreshProviders();

  logger.info({ dataDir: config.dataDir, exclusionFile: config.exclusionFile }, "Monitor ready");
  return monitor;
}
