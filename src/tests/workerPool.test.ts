import { describe, it, expect } from "vitest";
import { delay, runPool } from "../core/execution/workerPool.js";
import { AbortedError } from "../core/errors.js";

describe("runPool", () => {
  it("should keep outcomes in input order", async () => {
    const outcomes = await runPool([30, 10, 20], 3, async (ms) => {
      await delay(ms);
      return ms * 2;
    });

    expect(outcomes).toEqual([
      { status: "fulfilled", value: 60 },
      { status: "fulfilled", value: 20 },
      { status: "fulfilled", value: 40 },
    ]);
  });

  it("should record failures without stopping the pool", async () => {
    const boom = new Error("boom");
    const outcomes = await runPool([1, 2, 3], 1, async (n) => {
      if (n === 2) throw boom;
      return n;
    });

    expect(outcomes).toEqual([
      { status: "fulfilled", value: 1 },
      { status: "rejected", reason: boom },
      { status: "fulfilled", value: 3 },
    ]);
  });

  it("should limit the number of concurrent workers", async () => {
    let active = 0;
    let peak = 0;
    await runPool([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      active++;
      peak = Math.max(peak, active);
      await delay(5);
      active--;
    });

    expect(peak).toBe(3);
  });

  it("should mark items as skipped once the signal aborts", async () => {
    const controller = new AbortController();
    const outcomes = await runPool(
      ["a", "b", "c"],
      1,
      async (item) => {
        if (item === "a") controller.abort();
        return item;
      },
      controller.signal,
    );

    expect(outcomes).toEqual([
      { status: "fulfilled", value: "a" },
      { status: "skipped" },
      { status: "skipped" },
    ]);
  });

  it("should handle an empty item list", async () => {
    expect(await runPool([], 4, async () => 1)).toEqual([]);
  });
});

describe("delay", () => {
  it("should reject with AbortedError when the signal aborts", async () => {
    const controller = new AbortController();
    const waiting = delay(60_000, controller.signal);
    controller.abort();

    await expect(waiting).rejects.toBeInstanceOf(AbortedError);
  });

  it("should reject immediately for an already aborted signal", async () => {
    await expect(delay(60_000, AbortSignal.abort())).rejects.toBeInstanceOf(AbortedError);
  });
});
