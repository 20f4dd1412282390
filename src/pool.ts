/**
 * Bounded worker pool for per-target sweeps.
 */

export type PoolOptions<T, R> = {
  /** Number of concurrent workers (default: 4). */
  concurrency?: number;
  /** Stops handing out new items once aborted. */
  signal?: AbortSignal;
  /** Result recorded for items never started because the signal fired. */
  onAborted: (item: T) => R;
};

/**
 * Process items with a concurrency pool. Results keep the input order
 * regardless of completion order.
 */
export async function processPooled<T, R>(
  items: readonly T[],
  processor: (item: T) => Promise<R>,
  options: PoolOptions<T, R>,
): Promise<R[]> {
  const { concurrency = 4, signal, onAborted } = options;
  const results: R[] = new Array(items.length);
  let nextIndex = 0;

  const workers = Array.from({ length: Math.min(Math.max(1, concurrency), items.length) }, async () => {
    while (nextIndex < items.length) {
      const idx = nextIndex++;
      const item = items[idx];
      results[idx] = signal?.aborted ? onAborted(item) : await processor(item);
    }
  });

  await Promise.all(workers);
  return results;
}
