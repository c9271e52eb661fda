/**
 * Maps `items` through `worker` with at most `limit` calls in flight.
 * Results keep the input order. After the first worker rejection no further
 * items are started, and the call rejects once the calls in flight settle.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results = new Array<R>(items.length);
  let next = 0;
  let failed = false;

  async function runLane(): Promise<void> {
    while (!failed && next < items.length) {
      const index = next;
      next += 1;
      try {
        results[index] = await worker(items[index], index);
      } catch (error) {
        failed = true;
        throw error;
      }
    }
  }

  const lanes = Math.max(1, Math.min(limit, items.length));
  const settled = await Promise.allSettled(Array.from({ length: lanes }, () => runLane()));
  for (const outcome of settled) {
    if (outcome.status === "rejected") throw outcome.reason;
  }
  return results;
}
