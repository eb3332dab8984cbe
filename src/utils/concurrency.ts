/**
 * Bounded Concurrency
 * @module utils/concurrency
 *
 * Worker-pool helper for batch rendering and validation. Each task settles
 * on its own; a rejection is recorded for its index and never affects the
 * other tasks.
 */

/**
 * Outcome of one task, in input order
 */
export type Settled<R> =
  | { readonly status: 'fulfilled'; readonly index: number; readonly value: R }
  | { readonly status: 'rejected'; readonly index: number; readonly reason: unknown };

/**
 * Run `operation` over `items` with at most `concurrency` in flight
 */
export async function parallelWithLimit<T, R>(
  items: readonly T[],
  operation: (item: T, index: number) => Promise<R>,
  concurrency: number = 4
): Promise<Settled<R>[]> {
  const outcomes: Settled<R>[] = new Array(items.length);
  let currentIndex = 0;
  const limit = Number.isFinite(concurrency) ? Math.max(1, Math.floor(concurrency)) : 1;

  const workers = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, async () => {
    while (currentIndex < items.length) {
      const index = currentIndex++;
      try {
        outcomes[index] = { status: 'fulfilled', index, value: await operation(items[index], index) };
      } catch (reason) {
        outcomes[index] = { status: 'rejected', index, reason };
      }
    }
  });

  await Promise.all(workers);

  return outcomes;
}
