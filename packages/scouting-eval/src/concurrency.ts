import { AdapterTimeoutError } from "./errors";

export type AbortableTask<T> = (abortSignal: AbortSignal) => Promise<T>;

/**
 * Runs `task` with an abort signal that fires after `timeoutMs`. The returned
 * promise rejects with `AdapterTimeoutError` at that point even when the task
 * ignores the signal.
 */
export async function runWithTimeout<T>(
  task: AbortableTask<T>,
  timeoutMs?: number
): Promise<T> {
  const controller = new AbortController();
  if (typeof timeoutMs !== "number" || !Number.isFinite(timeoutMs) || timeoutMs <= 0) {
    return task(controller.signal);
  }

  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => {
      const error = new AdapterTimeoutError(timeoutMs);
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

/**
 * Starts every task at once and waits for all of them. Results keep task
 * order; one task failing or timing out never cuts the others short.
 */
export async function settleAll<T>(
  tasks: readonly AbortableTask<T>[],
  options: { timeoutMs?: number } = {}
): Promise<PromiseSettledResult<T>[]> {
  return Promise.allSettled(
    tasks.map((task) => runWithTimeout(task, options.timeoutMs))
  );
}

export async function processWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T, index: number) => Promise<R>,
  options?: {
    onProgress?: (completed: number, inProgress: number, total: number) => void;
  }
): Promise<R[]> {
  if (items.length === 0) {
    return [];
  }

  const workerCount = Math.min(normalizeConcurrency(concurrency), items.length);
  const results = new Array<R>(items.length);
  // Workers share one iterator, so each index is claimed exactly once.
  const queue = items.entries();
  let completed = 0;
  let inProgress = 0;

  const reportProgress = () => {
    options?.onProgress?.(completed, inProgress, items.length);
  };

  reportProgress();

  async function runWorker(): Promise<void> {
    for (const [index, item] of queue) {
      inProgress++;
      reportProgress();
      try {
        results[index] = await processor(item, index);
      } finally {
        inProgress = Math.max(0, inProgress - 1);
        completed++;
        reportProgress();
      }
    }
  }

  await Promise.all(Array.from({ length: workerCount }, runWorker));
  return results;
}

export function normalizeConcurrency(value: number | undefined): number {
  if (typeof value !== "number" || !Number.isFinite(value)) {
    return 1;
  }
  return Math.max(1, Math.floor(value));
}
