// Bounded-concurrency pool. Results are stored by input index, so the
// output order never depends on completion order.

export async function runPool<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`concurrency must be a positive integer, got ${concurrency}`);
  }
  const results = new Array<R>(items.length);
  let next = 0;
  let stopped = false;

  const lane = async (): Promise<void> => {
    while (!stopped && next < items.length) {
      signal?.throwIfAborted();
      const index = next++;
      try {
        results[index] = await worker(items[index], index);
      } catch (err) {
        // First failure stops every lane from picking up new work
        stopped = true;
        throw err;
      }
    }
  };

  await Promise.all(Array.from({ length: Math.min(concurrency, items.length) }, lane));
  return results;
}
