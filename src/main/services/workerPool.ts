/**
 * Bounded-Concurrency Worker Pool
 *
 * Runs a task over a list of items with at most `concurrency` tasks in flight.
 * Results and errors are collected per index, so the output lines up with the
 * input no matter which task finishes first.
 *
 * - Per-item error isolation: a failing task is recorded and the pool moves on
 * - Cancellation through an AbortSignal: no new item starts after abort, tasks
 *   already running are awaited
 * - Progress callback after every completed item
 *
 * Tasks share the one JavaScript thread: the pool overlaps their file and
 * network I/O, but tag parsing itself does not run on several CPUs at once.
 */

import * as os from 'os';

/**
 * Called after each completed item with (completed, total). If it throws, it
 * is not called again and the pool rejects with that error once every
 * started task has finished.
 */
export type ProgressCallback = (completed: number, total: number) => void;

/** Options for runWorkerPool */
export interface WorkerPoolOptions {
  /** Maximum number of tasks in flight. Defaults to 2 × available CPUs */
  concurrency?: number;
  onProgress?: ProgressCallback;
  /** Stops submission of new items once aborted */
  signal?: AbortSignal;
  /** Converts a thrown value into the recorded error. Defaults to wrapping in Error */
  toError?: (error: unknown, index: number) => Error;
}

/** Outcome of a pool run; arrays are indexed like the input items */
export interface WorkerPoolResult<R> {
  /** Task result, undefined when the task failed or never started */
  results: Array<R | undefined>;
  /** Task error, null when the task succeeded or never started */
  errors: Array<Error | null>;
  /** Number of items whose task ran to completion (successfully or not) */
  completed: number;
  /** Whether submission stopped early because the signal was aborted */
  cancelled: boolean;
}

/** Task signature: receives the item and its index */
export type PoolTask<T, R> = (item: T, index: number) => Promise<R>;

function defaultToError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Runs `task` over `items` with bounded parallelism.
 *
 * Every issued item is attempted exactly once, even when onProgress throws. Items that were never issued
 * because of cancellation keep an undefined result and a null error.
 */
export async function runWorkerPool<T, R>(
  items: readonly T[],
  task: PoolTask<T, R>,
  options: WorkerPoolOptions = {},
): Promise<WorkerPoolResult<R>> {
  const total = items.length;
  const results: Array<R | undefined> = new Array<R | undefined>(total).fill(undefined);
  const errors: Array<Error | null> = new Array<Error | null>(total).fill(null);
  const concurrency = Math.max(1, Math.floor(options.concurrency ?? os.availableParallelism() * 2));
  const toError = options.toError ?? defaultToError;

  let nextIndex = 0;
  let completed = 0;
  let cancelled = false;
  const progressErrors: Error[] = [];

  const processNext = async (): Promise<void> => {
    while (nextIndex < total) {
      if (options.signal?.aborted) {
        cancelled = true;
        break;
      }

      const currentIndex = nextIndex++;

      try {
        results[currentIndex] = await task(items[currentIndex], currentIndex);
      } catch (error: unknown) {
        errors[currentIndex] = toError(error, currentIndex);
      }

      completed++;
      if (options.onProgress && progressErrors.length === 0) {
        try {
          options.onProgress(completed, total);
        } catch (error: unknown) {
          progressErrors.push(defaultToError(error));
        }
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < Math.min(concurrency, total); i++) {
    workers.push(processNext());
  }
  await Promise.all(workers);

  if (progressErrors.length > 0) {
    throw progressErrors[0];
  }

  return { results, errors, completed, cancelled };
}
