/**
 * Map over items with at most `limit` mappers in flight. Results keep input order.
 *
 * Once a mapper fails no new item is started; in-flight work is allowed to settle and the
 * first error is rethrown.
 */
export async function mapConcurrent<T, R>(
  items: readonly T[],
  limit: number,
  mapper: (item: T, index: number) => Promise<R>
): Promise<R[]> {
  const results: R[] = new Array<R>(items.length);
  const errors: unknown[] = [];
  let nextIndex = 0;

  const worker = async (): Promise<void> => {
    while (errors.length === 0 && nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;
      try {
        results[index] = await mapper(items[index], index);
      } catch (err) {
        errors.push(err);
      }
    }
  };

  const workerCount = Math.max(1, Math.min(limit, items.length));
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (errors.length > 0) {
    throw errors[0];
  }
  return results;
}
