/**
 * Async helpers for talking to slow collaborators: per-call timeouts and a
 * bounded worker pool that stops scheduling after the first failure.
 */

export class TimeoutError extends Error {
  constructor(label: string, public readonly timeoutMs: number) {
    super(`${label} timed out after ${timeoutMs}ms`);
    this.name = 'TimeoutError';
  }
}

/**
 * Race a promise against a timer. The underlying work is not cancelled; if it
 * settles after the deadline its result is dropped.
 */
export function withTimeout<T>(work: Promise<T>, timeoutMs: number, label: string = 'Operation'): Promise<T> {
  let timer: NodeJS.Timeout | undefined;

  const deadline = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new TimeoutError(label, timeoutMs)), timeoutMs);
  });

  return Promise.race([work, deadline]).finally(() => clearTimeout(timer));
}

export function splitIntoBatches<T>(items: readonly T[], batchSize: number): T[][] {
  if (!Number.isInteger(batchSize) || batchSize <= 0) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const batches: T[][] = [];
  for (let i = 0; i < items.length; i += batchSize) {
    batches.push(items.slice(i, i + batchSize));
  }
  return batches;
}

export interface TaskFailure<T> {
  item: T;
  index: number;
  error: unknown;
}

export type BoundedRunResult<T, R> =
  | { ok: true; results: R[] }
  | { ok: false; failures: TaskFailure<T>[]; completed: number };

/**
 * Run `worker` over `items` with at most `concurrency` tasks in flight.
 *
 * After the first failure no new task is started; tasks already running are
 * awaited and any further failures are collected, so the caller sees every
 * error from the fan-out at once.
 */
export async function runBounded<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<BoundedRunResult<T, R>> {
  if (!Number.isInteger(concurrency) || concurrency <= 0) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results = new Array<R>(items.length);
  const failures: TaskFailure<T>[] = [];
  let next = 0;
  let completed = 0;

  const lane = async (): Promise<void> => {
    while (failures.length === 0 && next < items.length) {
      const index = next++;
      const item = items[index];
      try {
        results[index] = await worker(item, index);
        completed++;
      } catch (error) {
        failures.push({ item, index, error });
      }
    }
  };

  const lanes = Array.from({ length: Math.min(concurrency, items.length) }, () => lane());
  await Promise.all(lanes);

  if (failures.length > 0) {
    failures.sort((a, b) => a.index - b.index);
    return { ok: false, failures, completed };
  }

  return { ok: true, results };
}
