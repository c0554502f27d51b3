import { v4 as uuidv4 } from "uuid";
import { z } from "zod";
import { createLogger } from "../logger.js";
import { ConfigurationError, NotFoundError, toConfigurationError } from "../errors.js";
import { ScheduleSchema, ScheduleTemperatureSchema, type Schedule } from "../schemas/index.js";
import type { Store } from "../store/store.js";
import { nextRunAfter, validateCronExpression } from "./cron.js";

const logger = createLogger("schedule-service");

export const ScheduleInputSchema = z.object({
  name: z.string().trim().min(1, "schedule name is required"),
  promptIds: z.array(z.string().min(1)).min(1, "at least one prompt is required"),
  llmIds: z.array(z.string().min(1)).min(1, "at least one LLM is required"),
  cronExpr: z.string().trim().min(1, "cron expression is required"),
  temperature: ScheduleTemperatureSchema.default(0.7),
  enabled: z.boolean().default(true),
});
export type ScheduleInput = z.input<typeof ScheduleInputSchema>;

/**
 * Schedule CRUD with validation.
 *
 * Cron expressions are checked here, so a malformed one fails when the
 * schedule is saved rather than when it would fire. `nextRun` is kept in
 * step with `enabled`.
 */
export class ScheduleService {
  constructor(
    private readonly store: Store,
    private readonly now: () => Date = () => new Date(),
  ) {}

  async createSchedule(input: ScheduleInput): Promise<Schedule> {
    const data = this.parseInput(input);
    await this.checkReferences(data.promptIds, data.llmIds);

    const timestamp = this.now();
    const schedule: Schedule = withNextRun(
      {
        id: uuidv4(),
        ...data,
        createdAt: timestamp.toISOString(),
        updatedAt: timestamp.toISOString(),
      },
      timestamp,
    );

    await this.store.createSchedule(schedule);
    logger.info({ scheduleId: schedule.id, cron: schedule.cronExpr, nextRun: schedule.nextRun }, "Schedule created");
    return schedule;
  }

  async updateSchedule(id: string, changes: Partial<ScheduleInput>): Promise<Schedule> {
    const existing = await this.getSchedule(id);
    const data = this.parseInput({
      name: existing.name,
      promptIds: existing.promptIds,
      llmIds: existing.llmIds,
      cronExpr: existing.cronExpr,
      temperature: existing.temperature,
      enabled: existing.enabled,
      ...changes,
    });
    await this.checkReferences(data.promptIds, data.llmIds);

    const timestamp = this.now();
    const updated = withNextRun({ ...existing, ...data, updatedAt: timestamp.toISOString() }, timestamp);
    await this.store.updateSchedule(ScheduleSchema.parse(updated));
    return updated;
  }

  async enableSchedule(id: string): Promise<Schedule> {
    return this.updateSchedule(id, { enabled: true });
  }

  async disableSchedule(id: string): Promise<Schedule> {
    return this.updateSchedule(id, { enabled: false });
  }

  async deleteSchedule(id: string): Promise<boolean> {
    return this.store.deleteSchedule(id);
  }

  async getSchedule(id: string): Promise<Schedule> {
    const schedule = await this.store.getSchedule(id);
    if (!schedule) {
      throw new NotFoundError(`Schedule ${id} not found`);
    }
    return schedule;
  }

  async listSchedules(enabled?: boolean): Promise<Schedule[]> {
    return this.store.listSchedules(enabled);
  }

  private parseInput(input: ScheduleInput): z.output<typeof ScheduleInputSchema> {
    const parsed = ScheduleInputSchema.safeParse(input);
    if (!parsed.success) {
      throw toConfigurationError(parsed.error, "Invalid schedule");
    }
    validateCronExpression(parsed.data.cronExpr);
    return parsed.data;
  }

  private async checkReferences(promptIds: string[], llmIds: string[]): Promise<void> {
    for (const promptId of promptIds) {
      if (!(await this.store.getPrompt(promptId))) {
        throw new ConfigurationError(`Prompt ${promptId} not found`);
      }
    }
    for (const llmId of llmIds) {
      if (!(await this.store.getLLM(llmId))) {
        throw new ConfigurationError(`LLM ${llmId} not found`);
      }
    }
  }
}

/** Enabled schedules get their next due time; disabled ones lose it. */
export function withNextRun(schedule: Schedule, now: Date): Schedule {
  if (!schedule.enabled) {
    const { nextRun: _dropped, ...rest } = schedule;
    return rest;
  }
  return { ...schedule, nextRun: nextRunAfter(schedule.cronExpr, now).toISOString() };
}
