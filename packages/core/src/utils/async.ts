/**
 * Promise helpers shared by the query and analysis pools
 */

import { Errors } from '../errors.js';

export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Race a promise against a deadline. The timer is cleared either way.
 *
 * @throws LumoraError with code TIMEOUT when the deadline passes first
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  operation: string
): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(Errors.timeout(operation, timeoutMs)), timeoutMs);
  });

  try {
    return await Promise.race([promise, deadline]);
  } finally {
    clearTimeout(timer);
  }
}

/**
 * Bounded pool that runs `worker` over `items` with at most `concurrency`
 * calls in flight. Results keep the position of their input item.
 *
 * `onSettled` fires once per item in completion order. A worker that
 * rejects rejects the whole pool; callers that need best-effort semantics
 * catch inside the worker.
 */
export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  onSettled?: (result: R, index: number) => void
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(concurrency, items.length));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const result = await worker(items[index], index);
      results[index] = result;
      onSettled?.(result, index);
    }
  };

  await Promise.all(Array.from({ length: limit }, () => lane()));
  return results;
}
