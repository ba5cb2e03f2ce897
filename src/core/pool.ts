/**
 * Bounded concurrency helpers.
 */

import { TaskTimeoutError } from "./errors.js";

/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 *
 * Each lane pulls the next index until the list is drained. `onSettled` is
 * invoked in completion order from the single event loop thread, so it may
 * fold results into shared state without locking.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: R, index: number) => void
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;

  const lane = async (): Promise<void> => {
    while (true) {
      const i = next++;
      if (i >= items.length) return;
      const item = items[i];
      if (item === undefined) return;
      const result = await worker(item, i);
      results[i] = result;
      onSettled?.(result, i);
    }
  };

  const laneCount = Math.min(Math.max(1, concurrency), items.length);
  const lanes: Promise<void>[] = [];
  for (let w = 0; w < laneCount; w++) lanes.push(lane());
  await Promise.all(lanes);

  return results;
}

/**
 * Run `task` with an AbortSignal that fires after `timeoutMs`.
 * Rejects with TaskTimeoutError once the bound passes, whether or not the
 * task honours the signal.
 */
export async function withTimeout<R>(
  commitId: string,
  timeoutMs: number,
  task: (signal: AbortSignal) => Promise<R>
): Promise<R> {
  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;

  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new TaskTimeoutError(commitId, timeoutMs);
      controller.abort(error);
      reject(error);
    }, timeoutMs);
  });

  try {
    return await Promise.race([task(controller.signal), timeout]);
  } finally {
    clearTimeout(timer);
  }
}
