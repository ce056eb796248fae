/**
 * @fileoverview Async Utilities
 *
 * Shared async helper functions used across the codebase.
 *
 * @packageDocumentation
 */

/**
 * Map over items with at most `concurrency` calls in flight.
 *
 * Results keep the input order. The first rejection rejects the whole call;
 * workers that are already running finish but no new item is started.
 *
 * @example
 * ```typescript
 * const sizes = await mapWithConcurrency(files, 4, async (file) => (await fs.stat(file)).size);
 * ```
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  fn: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  const limit = Math.max(1, Math.min(Math.floor(concurrency) || 1, items.length));
  let next = 0;
  let failed = false;

  const worker = async (): Promise<void> => {
    while (!failed && next < items.length) {
      const index = next++;
      try {
        results[index] = await fn(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  };

  const workers: Promise<void>[] = [];
  for (let i = 0; i < limit; i++) {
    workers.push(worker());
  }
  await Promise.all(workers);

  return results;
}
