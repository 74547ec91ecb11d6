export interface WorkerPoolOptions<T> {
  concurrency: number;
  /** Checked before each item is handed to a worker */
  shouldStop: () => boolean;
  worker: (item: T) => Promise<void>;
}

/**
 * Run `worker` over `items` with at most `concurrency` in flight.
 *
 * Stopping is cooperative: once `shouldStop` returns true no further items are
 * started, while those already started run to completion. Resolves with the
 * items that were never started.
 */
export async function runWorkerPool<T>(items: readonly T[], options: WorkerPoolOptions<T>): Promise<T[]> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`Worker pool concurrency must be a positive integer, got ${options.concurrency}`);
  }

  let next = 0;
  const lane = async (): Promise<void> => {
    while (next < items.length) {
      if (options.shouldStop()) return;
      const item = items[next++];
      await options.worker(item);
    }
  };

  const lanes = Math.min(options.concurrency, items.length);
  await Promise.all(Array.from({ length: lanes }, () => lane()));
  return items.slice(next);
}
