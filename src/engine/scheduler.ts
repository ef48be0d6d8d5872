/**
 * Run `fn` over `items` with at most `limit` calls in flight.
 *
 * Workers pull the next index as soon as they finish, so a slow item
 * never holds back its siblings. Rejections are collected rather than
 * thrown; the returned array is index-aligned with `items`.
 */
export async function settledPool<T, R>(
  limit: number,
  items: readonly T[],
  fn: (item: T, index: number) => Promise<R>,
): Promise<PromiseSettledResult<R>[]> {
  const results: PromiseSettledResult<R>[] = new Array(items.length);
  let next = 0;

  const worker = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      try {
        results[index] = { status: "fulfilled", value: await fn(items[index], index) };
      } catch (reason) {
        results[index] = { status: "rejected", reason };
      }
    }
  };

  const width = Math.max(1, Math.min(limit, items.length));
  const workers: Promise<void>[] = [];
  for (let i = 0; i < width && i < items.length; i++) workers.push(worker());
  await Promise.all(workers);
  return results;
}
