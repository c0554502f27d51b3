import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { Scheduler } from "../core/scheduler/scheduler.js";
import { ExecutionCoordinator } from "../core/execution/coordinator.js";
import { NotFoundError, ScheduleBusyError } from "../core/errors.js";
import { InMemoryStore } from "../core/store/memoryStore.js";
import { ProviderRegistry } from "../providers/registry.js";
import type { Schedule } from "../core/schemas/index.js";
import { ScriptedProvider, makeLLM, makePrompt, makeSchedule, recordingSleep } from "./fixtures.js";

const NOW = new Date("2024-01-01T09:00:00Z");

describe("Scheduler", () => {
  let store: InMemoryStore;
  let provider: ScriptedProvider;
  let scheduler: Scheduler;
  let randomValue: number;

  beforeEach(async () => {
    store = new InMemoryStore();
    const registry = new ProviderRegistry();
    provider = new ScriptedProvider();
    registry.register(provider);
    randomValue = 0.25;
    const coordinator = new ExecutionCoordinator({
      store,
      registry,
      sleep: recordingSleep().sleep,
      random: () => randomValue,
      now: () => NOW,
    });
    scheduler = new Scheduler({ store, coordinator, now: () => NOW });

    await store.createPrompt(makePrompt("p1"));
    await store.createPrompt(makePrompt("p2"));
    await store.createLLM(makeLLM("l1"));
  });

  afterEach(async () => {
    provider.release();
    await scheduler.stop();
  });

  it("should execute a schedule now and update its run times", async () => {
    await store.createSchedule(
      makeSchedule("s1", { promptIds: ["p1", "p2"], nextRun: "2024-01-05T09:00:00.000Z" }),
    );

    const result = await scheduler.executeNow("s1");

    expect(result.scheduleId).toBe("s1");
    expect(result.scheduleName).toBe("Schedule s1");
    expect(result.totalExecutions).toBe(2);
    expect(result.successfulExecutions).toBe(2);
    expect(result.responses.every((r) => r.scheduleId === "s1" && r.temperature === 0.5)).toBe(true);

    const stored = await store.getSchedule("s1");
    expect(stored!.lastRun).toBe("2024-01-01T09:00:00.000Z");
    expect(stored!.nextRun).toBe("2024-01-02T09:00:00.000Z");
  });

  it("should throw NotFoundError for an unknown schedule", async () => {
    await expect(scheduler.executeNow("ghost")).rejects.toBeInstanceOf(NotFoundError);
  });

  it("should reject executeNow while the schedule is running", async () => {
    await store.createSchedule(makeSchedule("s1"));
    provider.hold();

    const first = scheduler.executeNow("s1");
    await vi.waitFor(() => expect(provider.inFlight).toBe(1));

    await expect(scheduler.executeNow("s1")).rejects.toBeInstanceOf(ScheduleBusyError);
    expect(scheduler.status().activeRuns).toEqual(["s1"]);

    provider.release();
    expect((await first).successfulExecutions).toBe(1);
    expect(scheduler.status().activeRuns).toEqual([]);
  });

  it("should trigger only due, idle, enabled schedules on tick", async () => {
    await store.createSchedule(makeSchedule("due", { nextRun: "2024-01-01T08:00:00.000Z" }));
    await store.createSchedule(makeSchedule("later", { nextRun: "2024-01-01T10:00:00.000Z" }));
    await store.createSchedule(makeSchedule("fresh"));
    await store.createSchedule(
      makeSchedule("off", { enabled: false, nextRun: "2024-01-01T08:00:00.000Z" }),
    );

    const started = await scheduler.tick(NOW);
    await scheduler.waitForIdle();

    expect(started).toEqual(["due"]);
    expect((await store.getSchedule("due"))!.lastRun).toBe("2024-01-01T09:00:00.000Z");
    expect((await store.getSchedule("later"))!.lastRun).toBeUndefined();
    expect((await store.getSchedule("off"))!.lastRun).toBeUndefined();

    const fresh = await store.getSchedule("fresh");
    expect(fresh!.lastRun).toBeUndefined();
    expect(fresh!.nextRun).toBe("2024-01-02T09:00:00.000Z");
  });

  it("should keep ticking past a schedule whose cron no longer parses", async () => {
    await store.createSchedule(makeSchedule("a-broken", { cronExpr: "0 25 * * *" }));
    await store.createSchedule(makeSchedule("b-due", { nextRun: "2024-01-01T08:00:00.000Z" }));

    const started = await scheduler.tick(NOW);
    await scheduler.waitForIdle();

    expect(started).toEqual(["b-due"]);
    expect((await store.getSchedule("b-due"))!.lastRun).toBe("2024-01-01T09:00:00.000Z");
    expect((await store.getSchedule("a-broken"))!.nextRun).toBeUndefined();
  });

  it("should keep ticking past a schedule that cannot be saved", async () => {
    class StuckScheduleStore extends InMemoryStore {
      override async updateSchedule(schedule: Schedule): Promise<void> {
        if (schedule.id === "a-stuck") throw new Error("disk full");
        return super.updateSchedule(schedule);
      }
    }
    const stuckStore = new StuckScheduleStore();
    const registry = new ProviderRegistry();
    registry.register(new ScriptedProvider());
    const coordinator = new ExecutionCoordinator({ store: stuckStore, registry, now: () => NOW });
    const local = new Scheduler({ store: stuckStore, coordinator, now: () => NOW });
    await stuckStore.createPrompt(makePrompt("p1"));
    await stuckStore.createLLM(makeLLM("l1"));
    await stuckStore.createSchedule(makeSchedule("a-stuck"));
    await stuckStore.createSchedule(makeSchedule("b-due", { nextRun: "2024-01-01T08:00:00.000Z" }));

    expect(await local.tick(NOW)).toEqual(["b-due"]);
    await local.waitForIdle();
    expect(await stuckStore.countResponses()).toBe(1);
  });

  it("should stop planning a schedule whose cron no longer parses after it ran", async () => {
    await store.createSchedule(
      makeSchedule("s1", { cronExpr: "0 25 * * *", nextRun: "2024-01-01T08:00:00.000Z" }),
    );

    const result = await scheduler.executeNow("s1");

    expect(result.successfulExecutions).toBe(1);
    expect((await store.getSchedule("s1"))!.nextRun).toBeUndefined();
    expect(await scheduler.tick(NOW)).toEqual([]);
  });

  it("should skip a busy schedule on tick", async () => {
    await store.createSchedule(makeSchedule("s1", { nextRun: "2024-01-01T08:00:00.000Z" }));
    provider.hold();

    const running = scheduler.executeNow("s1");
    await vi.waitFor(() => expect(provider.inFlight).toBe(1));

    expect(await scheduler.tick(NOW)).toEqual([]);

    provider.release();
    await running;
    expect(provider.calls).toHaveLength(1);
  });

  it("should skip missing prompts and disabled LLMs", async () => {
    await store.createLLM(makeLLM("l2", { enabled: false }));
    await store.createSchedule(makeSchedule("s1", { promptIds: ["p1", "ghost"], llmIds: ["l1", "l2"] }));

    const result = await scheduler.executeNow("s1");

    expect(result.totalExecutions).toBe(1);
    expect(result.responses[0]!.llmId).toBe("l1");
  });

  it("should use the schedule's random temperature", async () => {
    await store.createSchedule(makeSchedule("s1", { temperature: "random" }));

    const result = await scheduler.executeNow("s1");

    expect(result.responses[0]!.temperature).toBe(0.25);
  });

  it("should recompute nextRun after a failed run", async () => {
    const failing = new ScriptedProvider("scripted", [Object.assign(new Error("Unauthorized"), { status: 401 })]);
    const registry = new ProviderRegistry();
    registry.register(failing);
    const coordinator = new ExecutionCoordinator({ store, registry, now: () => NOW });
    const local = new Scheduler({ store, coordinator, now: () => NOW });
    await store.createSchedule(makeSchedule("s1", { nextRun: "2024-01-01T08:00:00.000Z" }));

    const result = await local.executeNow("s1");

    expect(result.failedExecutions).toBe(1);
    expect((await store.getSchedule("s1"))!.nextRun).toBe("2024-01-02T09:00:00.000Z");
  });

  it("should cancel in-flight runs on stop and accept new runs afterwards", async () => {
    await store.createSchedule(makeSchedule("s1"));
    provider.hold();

    const run = scheduler.executeNow("s1");
    await vi.waitFor(() => expect(provider.inFlight).toBe(1));
    const stopping = scheduler.stop();
    provider.release();

    const cancelled = await run;
    await stopping;
    expect(cancelled.skippedExecutions).toBe(1);
    expect(cancelled.successfulExecutions).toBe(0);
    expect(await store.countResponses()).toBe(0);

    const again = await scheduler.executeNow("s1");
    expect(again.successfulExecutions).toBe(1);
  });

  it("should report its running state", async () => {
    expect(scheduler.status()).toEqual({ running: false, activeRuns: [] });
    scheduler.start();
    expect(scheduler.status().running).toBe(true);
    await scheduler.stop();
    expect(scheduler.status()).toEqual({ running: false, activeRuns: [] });
  });
});
