import { describe, it, expect, beforeEach } from "vitest";
import { ScheduleService } from "../core/scheduler/scheduleService.js";
import { ConfigurationError, NotFoundError } from "../core/errors.js";
import { InMemoryStore } from "../core/store/memoryStore.js";
import { makeLLM, makePrompt } from "./fixtures.js";

const NOW = new Date("2024-01-01T09:00:00Z");

describe("ScheduleService", () => {
  let store: InMemoryStore;
  let service: ScheduleService;

  beforeEach(async () => {
    store = new InMemoryStore();
    service = new ScheduleService(store, () => NOW);
    await store.createPrompt(makePrompt("p1"));
    await store.createLLM(makeLLM("l1"));
  });

  it("should create an enabled schedule with its next run", async () => {
    const schedule = await service.createSchedule({
      name: "Daily",
      promptIds: ["p1"],
      llmIds: ["l1"],
      cronExpr: "0 9 * * *",
    });

    expect(schedule.enabled).toBe(true);
    expect(schedule.temperature).toBe(0.7);
    expect(schedule.nextRun).toBe("2024-01-02T09:00:00.000Z");
    expect(schedule.createdAt).toBe("2024-01-01T09:00:00.000Z");
    expect(await store.getSchedule(schedule.id)).toEqual(schedule);
  });

  it("should create a disabled schedule without a next run", async () => {
    const schedule = await service.createSchedule({
      name: "Paused",
      promptIds: ["p1"],
      llmIds: ["l1"],
      cronExpr: "0 9 * * *",
      temperature: "random",
      enabled: false,
    });

    expect(schedule.nextRun).toBeUndefined();
    expect(schedule.temperature).toBe("random");
  });

  it("should reject a malformed cron expression at creation", async () => {
    await expect(
      service.createSchedule({ name: "Bad", promptIds: ["p1"], llmIds: ["l1"], cronExpr: "0 9 * *" }),
    ).rejects.toThrow('Invalid cron expression "0 9 * *"');
    expect(await store.listSchedules()).toEqual([]);
  });

  it("should require at least one prompt and one LLM", async () => {
    await expect(
      service.createSchedule({ name: "Empty", promptIds: [], llmIds: ["l1"], cronExpr: "0 9 * * *" }),
    ).rejects.toThrow("at least one prompt is required");
    await expect(
      service.createSchedule({ name: "Empty", promptIds: ["p1"], llmIds: [], cronExpr: "0 9 * * *" }),
    ).rejects.toThrow("at least one LLM is required");
  });

  it("should reject an out-of-range temperature", async () => {
    await expect(
      service.createSchedule({
        name: "Hot",
        promptIds: ["p1"],
        llmIds: ["l1"],
        cronExpr: "0 9 * * *",
        temperature: 1.2,
      }),
    ).rejects.toBeInstanceOf(ConfigurationError);
  });

  it("should reject unknown prompt or LLM ids", async () => {
    await expect(
      service.createSchedule({ name: "X", promptIds: ["missing"], llmIds: ["l1"], cronExpr: "0 9 * * *" }),
    ).rejects.toThrow("Prompt missing not found");
    await expect(
      service.createSchedule({ name: "X", promptIds: ["p1"], llmIds: ["missing"], cronExpr: "0 9 * * *" }),
    ).rejects.toThrow("LLM missing not found");
  });

  it("should clear and restore nextRun when toggled", async () => {
    const created = await service.createSchedule({
      name: "Toggle",
      promptIds: ["p1"],
      llmIds: ["l1"],
      cronExpr: "0 12 * * *",
    });

    const disabled = await service.disableSchedule(created.id);
    expect(disabled.enabled).toBe(false);
    expect(disabled.nextRun).toBeUndefined();
    expect((await store.getSchedule(created.id))!.nextRun).toBeUndefined();

    const enabled = await service.enableSchedule(created.id);
    expect(enabled.nextRun).toBe("2024-01-01T12:00:00.000Z");
  });

  it("should recompute nextRun when the cron expression changes", async () => {
    const created = await service.createSchedule({
      name: "Change",
      promptIds: ["p1"],
      llmIds: ["l1"],
      cronExpr: "0 9 * * *",
    });

    const updated = await service.updateSchedule(created.id, { cronExpr: "30 10 * * *", name: "Changed" });

    expect(updated.name).toBe("Changed");
    expect(updated.nextRun).toBe("2024-01-01T10:30:00.000Z");
    expect(updated.createdAt).toBe(created.createdAt);
  });

  it("should throw NotFoundError for unknown schedules", async () => {
    await expect(service.getSchedule("nope")).rejects.toBeInstanceOf(NotFoundError);
    await expect(service.enableSchedule("nope")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should list and delete schedules", async () => {
    const a = await service.createSchedule({ name: "A", promptIds: ["p1"], llmIds: ["l1"], cronExpr: "0 9 * * *" });
    await service.createSchedule({
      name: "B",
      promptIds: ["p1"],
      llmIds: ["l1"],
      cronExpr: "0 9 * * *",
      enabled: false,
    });

    expect(await service.listSchedules()).toHaveLength(2);
    expect((await service.listSchedules(true)).map((s) => s.name)).toEqual(["A"]);
    expect(await service.deleteSchedule(a.id)).toBe(true);
    expect(await service.deleteSchedule(a.id)).toBe(false);
  });
});
