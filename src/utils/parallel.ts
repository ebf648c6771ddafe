/**
 * Bounded parallel processing
 *
 * Runs items through an async processor with at most `maxConcurrency` in
 * flight. Results keep the input ordering regardless of completion order.
 * When the signal aborts, no new item is started; in-flight items finish.
 */

import { logger } from './logger';

export interface ParallelOptions {
  maxConcurrency?: number;
  signal?: AbortSignal;
}

export interface ParallelOutcome<R> {
  /** Indexed like the input; undefined for items that never started */
  results: Array<R | undefined>;
  completed: number;
  skipped: number;
}

export async function processInParallel<T, R>(
  items: readonly T[],
  processor: (item: T, index: number) => Promise<R>,
  operationName: string,
  options: ParallelOptions = {}
): Promise<ParallelOutcome<R>> {
  const { maxConcurrency = 2, signal } = options;
  const results: Array<R | undefined> = new Array<R | undefined>(items.length).fill(undefined);
  const workerCount = Math.max(1, Math.min(maxConcurrency, items.length));

  let nextIndex = 0;
  let completed = 0;

  logger.debug({ operationName, totalItems: items.length, maxConcurrency: workerCount }, 'Starting parallel processing');

  const runWorker = async (): Promise<void> => {
    while (nextIndex < items.length) {
      if (signal?.aborted) {
        return;
      }
      const index = nextIndex++;
      results[index] = await processor(items[index], index);
      completed++;
    }
  };

  await Promise.all(Array.from({ length: workerCount }, () => runWorker()));

  const skipped = items.length - completed;
  if (skipped > 0) {
    logger.warn({ operationName, completed, skipped }, 'Parallel processing stopped before all items started');
  } else {
    logger.debug({ operationName, completed }, 'Parallel processing complete');
  }

  return { results, completed, skipped };
}
