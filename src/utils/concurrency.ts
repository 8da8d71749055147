// src/utils/concurrency.ts

/**
 * Run `worker` over `items` with at most `limit` calls in flight.
 * Results keep the input order.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const lanes = Math.max(1, Math.min(Math.floor(limit) || 1, items.length));
  let next = 0;

  const runLane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      results[index] = await worker(items[index], index);
    }
  };

  await Promise.all(Array.from({ length: lanes }, () => runLane()));
  return results;
}
