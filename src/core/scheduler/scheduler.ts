import { createLogger } from "../logger.js";
import { NotFoundError, ScheduleBusyError, errorMessage } from "../errors.js";
import type { ExecutionConfig, ExecutionResult, LLMConfig, Prompt, Schedule } from "../schemas/index.js";
import type { Store } from "../store/store.js";
import type { ExecutionCoordinator } from "../execution/coordinator.js";
import { nextRunAfter } from "./cron.js";

const logger = createLogger("scheduler");

export const DEFAULT_TICK_INTERVAL_MS = 60_000;

export interface SchedulerConfig {
  store: Store;
  coordinator: ExecutionCoordinator;
  tickIntervalMs?: number;
  /** Retry settings for scheduled runs; the schedule supplies the temperature. */
  executionConfig?: ExecutionConfig;
  now?: () => Date;
}

export interface SchedulerStatus {
  running: boolean;
  activeRuns: string[];
}

interface ActiveRun {
  promise: Promise<ExecutionResult>;
}

/**
 * Scheduler
 *
 * Owns the only map of running schedules. A schedule never overlaps
 * itself; different schedules run concurrently. Every run shares the
 * scheduler's AbortController so stop() can cancel them together.
 */
export class Scheduler {
  private readonly store: Store;
  private readonly coordinator: ExecutionCoordinator;
  private readonly tickIntervalMs: number;
  private readonly executionConfig: ExecutionConfig;
  private readonly now: () => Date;

  private readonly active = new Map<string, ActiveRun>();
  private controller = new AbortController();
  private timer: NodeJS.Timeout | undefined;
  private ticking: Promise<string[]> | undefined;

  constructor(config: SchedulerConfig) {
    this.store = config.store;
    this.coordinator = config.coordinator;
    this.tickIntervalMs = config.tickIntervalMs ?? DEFAULT_TICK_INTERVAL_MS;
    this.executionConfig = config.executionConfig ?? config.coordinator.getDefaults();
    this.now = config.now ?? (() => new Date());
  }

  start(): void {
    if (this.timer) return;
    if (this.controller.signal.aborted) {
      this.controller = new AbortController();
    }
    this.timer = setInterval(() => this.runTick(), this.tickIntervalMs);
    logger.info({ tickIntervalMs: this.tickIntervalMs }, "Scheduler started");
    this.runTick();
  }

  /** Stop ticking, cancel in-flight runs and wait for them to settle. */
  async stop(): Promise<void> {
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = undefined;
    }
    this.controller.abort();
    if (this.ticking) {
      await this.ticking;
    }
    await this.waitForIdle();
    logger.info("Scheduler stopped");
  }

  status(): SchedulerStatus {
    return { running: this.timer !== undefined, activeRuns: [...this.active.keys()].sort() };
  }

  isRunning(scheduleId: string): boolean {
    return this.active.has(scheduleId);
  }

  /** Resolve once every run started so far has settled. */
  async waitForIdle(): Promise<void> {
    while (this.active.size > 0) {
      await Promise.allSettled([...this.active.values()].map((run) => run.promise));
    }
  }

  /**
   * Trigger every enabled schedule that is due at `now` and idle.
   * Schedules without a nextRun get one stored and are not run.
   * Returns the ids of the schedules started.
   */
  async tick(now: Date = this.now()): Promise<string[]> {
    const schedules = await this.store.listSchedules(true);
    const started: string[] = [];

    for (const schedule of schedules) {
      if (this.active.has(schedule.id)) {
        logger.debug({ scheduleId: schedule.id }, "Schedule still running, skipping");
        continue;
      }
      if (!schedule.nextRun) {
        try {
          await this.storeNextRun(schedule.id, now);
        } catch (error) {
          logger.error({ scheduleId: schedule.id, error: errorMessage(error) }, "Could not store next run");
        }
        continue;
      }
      if (Date.parse(schedule.nextRun) > now.getTime()) continue;

      const run = this.launch(schedule);
      run.catch((error: unknown) => {
        logger.error({ scheduleId: schedule.id, error: errorMessage(error) }, "Scheduled run failed");
      });
      started.push(schedule.id);
    }
    return started;
  }

  /**
   * Run a schedule immediately, ignoring its cron timing.
   * Rejects with ScheduleBusyError when the schedule is already running.
   */
  async executeNow(scheduleId: string): Promise<ExecutionResult> {
    if (this.active.has(scheduleId)) {
      throw new ScheduleBusyError(scheduleId);
    }
    const schedule = await this.store.getSchedule(scheduleId);
    if (!schedule) {
      throw new NotFoundError(`Schedule ${scheduleId} not found`);
    }
    return this.launch(schedule);
  }

  private runTick(): void {
    if (this.ticking) return;
    this.ticking = this.tick()
      .catch((error: unknown) => {
        logger.error({ error: errorMessage(error) }, "Scheduler tick failed");
        return [];
      })
      .finally(() => {
        this.ticking = undefined;
      });
  }

  private launch(schedule: Schedule): Promise<ExecutionResult> {
    // Checked again after the awaits that led here.
    if (this.active.has(schedule.id)) {
      return Promise.reject(new ScheduleBusyError(schedule.id));
    }
    if (this.controller.signal.aborted && this.active.size === 0) {
      this.controller = new AbortController();
    }
    const promise = this.runSchedule(schedule).finally(() => {
      this.active.delete(schedule.id);
    });
    this.active.set(schedule.id, { promise });
    return promise;
  }

  private async runSchedule(schedule: Schedule): Promise<ExecutionResult> {
    const lastRun = this.now();
    await this.patchSchedule(schedule.id, (s) => ({ ...s, lastRun: lastRun.toISOString() }));
    logger.info({ scheduleId: schedule.id, name: schedule.name }, "Schedule run started");

    try {
      const [prompts, llms] = await Promise.all([
        this.resolvePrompts(schedule),
        this.resolveLLMs(schedule),
      ]);

      const result = await this.coordinator.runOnce(prompts, llms, this.executionConfig, {
        signal: this.controller.signal,
        scheduleId: schedule.id,
        scheduleName: schedule.name,
        temperature: schedule.temperature,
      });

      logger.info(
        {
          scheduleId: schedule.id,
          succeeded: result.successfulExecutions,
          failed: result.failedExecutions,
          skipped: result.skippedExecutions,
        },
        "Schedule run completed",
      );
      return result;
    } finally {
      try {
        await this.storeNextRun(schedule.id, lastRun);
      } catch (error) {
        logger.error({ scheduleId: schedule.id, error: errorMessage(error) }, "Could not store next run");
      }
    }
  }

  private async resolvePrompts(schedule: Schedule): Promise<Prompt[]> {
    const prompts: Prompt[] = [];
    for (const id of schedule.promptIds) {
      const prompt = await this.store.getPrompt(id);
      if (!prompt) {
        logger.warn({ scheduleId: schedule.id, promptId: id }, "Prompt not found, skipping");
        continue;
      }
      prompts.push(prompt);
    }
    return prompts;
  }

  private async resolveLLMs(schedule: Schedule): Promise<LLMConfig[]> {
    const llms: LLMConfig[] = [];
    for (const id of schedule.llmIds) {
      const llm = await this.store.getLLM(id);
      if (!llm) {
        logger.warn({ scheduleId: schedule.id, llmId: id }, "LLM not found, skipping");
        continue;
      }
      if (!llm.enabled) {
        logger.debug({ scheduleId: schedule.id, llmId: id }, "LLM disabled, skipping");
        continue;
      }
      llms.push(llm);
    }
    return llms;
  }

  /**
   * Store the next due time of an enabled schedule. A cron expression that
   * no longer parses clears nextRun, so the schedule stops firing.
   */
  private async storeNextRun(scheduleId: string, from: Date): Promise<void> {
    await this.patchSchedule(scheduleId, (s) => {
      if (!s.enabled) return s;
      try {
        return { ...s, nextRun: nextRunAfter(s.cronExpr, from).toISOString() };
      } catch (error) {
        logger.error({ scheduleId, cronExpr: s.cronExpr, error: errorMessage(error) }, "Schedule cannot be planned");
        if (s.nextRun === undefined) return s;
        const { nextRun: _cleared, ...rest } = s;
        return rest;
      }
    });
  }

  /**
   * Re-read before writing so concurrent edits to other fields survive.
   * A patch that returns the schedule unchanged writes nothing.
   */
  private async patchSchedule(scheduleId: string, patch: (schedule: Schedule) => Schedule): Promise<void> {
    const current = await this.store.getSchedule(scheduleId);
    if (!current) return;
    const next = patch(current);
    if (next === current) return;
    await this.store.updateSchedule({ ...next, updatedAt: this.now().toISOString() });
  }
}
