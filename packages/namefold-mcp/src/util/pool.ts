/**
 * Maps `items` through `fn` with at most `parallel` calls in flight.
 * Results keep the input order; with `parallel` 1 the calls run strictly one
 * after another.
 */
export async function mapPool<T, R>(items: readonly T[], parallel: number, fn: (item: T, index: number) => Promise<R>): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const total = items.length;
  let cursor = 0;
  const workerCount = Math.max(1, Math.min(total, Math.floor(parallel || 1)));
  const workers = Array.from({ length: workerCount }, () =>
    (async () => {
      while (true) {
        const index = cursor;
        cursor += 1;
        if (index >= total) {
          break;
        }
        results[index] = await fn(items[index], index);
      }
    })()
  );
  await Promise.all(workers);
  return results;
}
