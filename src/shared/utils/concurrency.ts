/**
 * Bounded parallel map.
 *
 * Runs `worker` over `items` in batches of up to `concurrency` at a time.
 * Results are returned in input order regardless of completion order.
 */
export async function mapInBatches<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> {
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`concurrency must be a positive integer, got ${concurrency}`);
  }

  const results: R[] = [];
  for (let start = 0; start < items.length; start += concurrency) {
    const batch = items.slice(start, start + concurrency);
    const batchResults = await Promise.all(
      batch.map((item, offset) => worker(item, start + offset)),
    );
    results.push(...batchResults);
  }
  return results;
}
