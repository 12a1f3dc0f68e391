import { DeadlineExceededError } from '../errors.js';

export interface PoolOptions {
  /** Maximum tasks in flight */
  concurrency: number;
  /** Wall-clock deadline for the whole batch; none when undefined */
  timeoutMs?: number;
}

export interface Fulfilled<T, R> {
  item: T;
  value: R;
}

export interface Rejected<T> {
  item: T;
  error: Error;
}

export interface PoolResult<T, R> {
  /** In completion order */
  fulfilled: Fulfilled<T, R>[];
  /** In completion order, then every item abandoned at the deadline */
  rejected: Rejected<T>[];
  timedOut: boolean;
}

function toError(err: unknown): Error {
  return err instanceof Error ? err : new Error(String(err));
}

/**
 * Run `task` over `items` with at most `concurrency` in flight.
 *
 * A task's failure is recorded against its item and does not stop the others.
 * Once the deadline passes nothing new starts, the pool stops waiting, every
 * item without an outcome is rejected with `DeadlineExceededError`, and
 * outcomes arriving later are dropped. Running tasks are not cancelled.
 */
export async function runPool<T, R>(
  items: readonly T[],
  task: (item: T) => Promise<R>,
  options: PoolOptions,
): Promise<PoolResult<T, R>> {
  if (!Number.isInteger(options.concurrency) || options.concurrency < 1) {
    throw new RangeError(`Pool concurrency must be a positive integer, got ${options.concurrency}`);
  }

  const fulfilled: Fulfilled<T, R>[] = [];
  const rejected: Rejected<T>[] = [];
  const settled = new Set<number>();
  const queue = items.entries();
  let abandoned = false;

  const worker = async (): Promise<void> => {
    for (const [index, item] of queue) {
      if (abandoned) return;
      try {
        const value = await task(item);
        if (abandoned) return;
        fulfilled.push({ item, value });
      } catch (err) {
        if (abandoned) return;
        rejected.push({ item, error: toError(err) });
      }
      settled.add(index);
    }
  };

  const workers = Array.from({ length: Math.min(options.concurrency, items.length) }, worker);
  const finished = Promise.all(workers).then(() => false);

  const { timeoutMs } = options;
  let timer: NodeJS.Timeout | undefined;
  let timedOut = false;
  try {
    timedOut =
      timeoutMs === undefined
        ? await finished
        : await Promise.race([
            finished,
            new Promise<boolean>((resolve) => {
              timer = setTimeout(() => resolve(true), timeoutMs);
            }),
          ]);
  } finally {
    clearTimeout(timer);
  }

  if (timedOut) {
    abandoned = true;
    items.forEach((item, index) => {
      if (!settled.has(index)) rejected.push({ item, error: new DeadlineExceededError(timeoutMs ?? 0) });
    });
  }

  return { fulfilled, rejected, timedOut };
}
