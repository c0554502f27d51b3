import { AbortedError } from "../errors.js";

export type Sleep = (ms: number, signal?: AbortSignal) => Promise<void>;

/**
 * Wait `ms` milliseconds. Rejects with AbortedError as soon as `signal`
 * aborts, clearing the timer.
 */
export const delay: Sleep = (ms, signal) =>
  new Promise<void>((resolve, reject) => {
    if (signal?.aborted) {
      reject(new AbortedError());
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new AbortedError());
    };
    const timer = setTimeout(() => {
      signal?.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal?.addEventListener("abort", onAbort, { once: true });
  });

export type PoolOutcome<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown }
  | { status: "skipped" };

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 *
 * Outcomes keep the order of `items`. A worker failure never stops the
 * pool; once `signal` aborts, items not yet started are reported as
 * "skipped".
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolOutcome<R>[]> {
  const outcomes: PoolOutcome<R>[] = items.map(() => ({ status: "skipped" }));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length && !signal?.aborted) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      try {
        outcomes[index] = { status: "fulfilled", value: await worker(item, index) };
      } catch (reason) {
        outcomes[index] = { status: "rejected", reason };
      }
    }
  };

  const lanes = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return outcomes;
}
