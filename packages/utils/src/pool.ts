/**
 * Bounded Concurrency
 *
 * Runs async work over a list with at most `concurrency` tasks in flight.
 * Results come back in input order whatever the completion order.
 * A limit that is not a whole number of at least one is rejected.
 */

export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const limit = Math.floor(concurrency);
  if (!Number.isFinite(limit) || limit < 1) {
    throw new Error(`Invalid concurrency: ${String(concurrency)} (expected integer >= 1)`);
  }
  if (items.length === 0) return [];

  const results: R[] = new Array<R>(items.length);
  const queue = items.map((item, index) => ({ item, index }));
  const slots = Math.min(limit, items.length);

  const runners = Array.from({ length: slots }, async () => {
    for (let next = queue.shift(); next; next = queue.shift()) {
      results[next.index] = await worker(next.item, next.index);
    }
  });

  await Promise.all(runners);
  return results;
}
