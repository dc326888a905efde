/**
 * Process items in parallel batches with error handling
 *
 * Instead of Promise.all() over everything at once, this processes items
 * in smaller batches so the Handle service and the repository are not
 * flooded. Uses Promise.allSettled so that a failure in one item doesn't
 * block the others.
 *
 * @param items - Array of items to process
 * @param batchSize - Number of items to process in parallel per batch
 * @param processor - Async function to process each item
 * @returns Array of settled results (same order as input)
 *
 * @example
 * const results = await processBatchedSettled(
 *   objects,
 *   5,
 *   async (object) => reconciler.syncDublinCore(object)
 * );
 */
export async function processBatchedSettled<T, R>(
  items: T[],
  batchSize: number,
  processor: (item: T) => Promise<R>
): Promise<PromiseSettledResult<R>[]> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`batchSize must be a positive integer, got ${batchSize}`);
  }

  const results: PromiseSettledResult<R>[] = [];

  // Process in batches
  for (let i = 0; i < items.length; i += batchSize) {
    const batch = items.slice(i, i + batchSize);
    const batchResults = await Promise.allSettled(
      batch.map(item => processor(item))
    );
    results.push(...batchResults);
  }

  return results;
}
