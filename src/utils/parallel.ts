/**
 * Bounded worker pool over an ordered list of items.
 */

export interface ParallelOptions {
  /** Maximum number of concurrent operations (default: 5) */
  concurrency?: number;
  /** Once aborted, no further item is started. In-flight items still settle. */
  signal?: AbortSignal;
}

export interface ParallelResult<T> {
  /**
   * Results addressed by input index; a throw is stored as its Error.
   * Slots for items that never started are left undefined.
   */
  results: (T | Error | undefined)[];
  /** Number of items that were never started */
  skippedCount: number;
}

/**
 * Run async operations in parallel with concurrency limit
 *
 * Workers pull the next index from a shared cursor and write only their own
 * slot, so results line up with items whatever the completion order.
 *
 * @example
 * const { results } = await parallelMap(frames, async (frame) => {
 *   return await detectFrame(frame);
 * }, { concurrency: 2, signal });
 */
export async function parallelMap<T, R>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
  options: ParallelOptions = {}
): Promise<ParallelResult<R>> {
  const { concurrency = 5, signal } = options;

  const results: (R | Error | undefined)[] = new Array<R | Error | undefined>(items.length).fill(undefined);
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (!signal?.aborted && nextIndex < items.length) {
      // Claim the index before any async work
      const index = nextIndex++;

      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        results[index] = error instanceof Error ? error : new Error(String(error));
      }
    }
  };

  const workerCount = Math.min(Math.max(1, concurrency), items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  return { results, skippedCount: items.length - nextIndex };
}

/**
 * Check if a result from parallelMap is an error
 */
export function isParallelError<T>(result: T | Error): result is Error {
  return result instanceof Error;
}
