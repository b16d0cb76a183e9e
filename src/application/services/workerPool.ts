export type PoolEntry<R> = {
  index: number;
  value: R;
};

export type PoolOutcome<R> = {
  /** Results of every unit that ran, in input order. */
  completed: PoolEntry<R>[];
  /** True when the signal stopped the pool before every item was started. */
  cancelled: boolean;
};

/**
 * Runs `worker` over `items` with at most `size` units in flight. Workers hand
 * back values instead of touching shared state; the caller merges them.
 *
 * Once `signal` aborts, no new unit starts and in-flight units finish. A worker
 * that throws stops the pool the same way and its error is rethrown after the
 * remaining in-flight units settle.
 */
export const runWithConcurrency = async <T, R>(
  items: readonly T[],
  size: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<PoolOutcome<R>> => {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError("Worker pool size must be an integer >= 1");
  }

  const pending = items.map((item, index) => ({ item, index }));
  const completed: PoolEntry<R>[] = [];
  const failures: unknown[] = [];

  const drain = async (): Promise<void> => {
    while (failures.length === 0 && !signal?.aborted) {
      const next = pending.shift();
      if (!next) {
        return;
      }

      try {
        completed.push({
          index: next.index,
          value: await worker(next.item, next.index),
        });
      } catch (error) {
        failures.push(error);
      }
    }
  };

  await Promise.all(
    Array.from({ length: Math.min(size, items.length) }, () => drain()),
  );

  if (failures.length > 0) {
    throw failures[0];
  }

  completed.sort((left, right) => left.index - right.index);
  return {
    completed,
    cancelled: completed.length < items.length,
  };
};
