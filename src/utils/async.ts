/**
 * Async Utility Functions
 *
 * @module
 */

// =============================================================================
// Sleep
// =============================================================================

/**
 * Returns a promise that resolves after the specified duration.
 *
 * @param ms - Duration in milliseconds
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

// =============================================================================
// Concurrency Utilities
// =============================================================================

/**
 * Runs promises in parallel with a concurrency limit. Results keep the order
 * of `items` regardless of completion order.
 *
 * @param items - Items to process
 * @param fn - Async function to apply to each item
 * @param concurrency - Maximum concurrent operations
 */
export async function mapConcurrent<T, U>(
  items: readonly T[],
  fn: (item: T, index: number) => Promise<U>,
  concurrency: number
): Promise<U[]> {
  const results: U[] = new Array(items.length);
  const queue = items.map((item, index) => ({ item, index }));

  async function worker(): Promise<void> {
    for (let next = queue.shift(); next; next = queue.shift()) {
      results[next.index] = await fn(next.item, next.index);
    }
  }

  const workers = Array.from(
    { length: Math.min(Math.max(1, concurrency), items.length) },
    () => worker()
  );

  await Promise.all(workers);
  return results;
}
