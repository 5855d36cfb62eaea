export type MapLimitOptions = {
  concurrency: number;
};

/**
 * Maps items with at most `concurrency` mappers in flight. Results keep input
 * order. The first rejection stops new work and is rethrown once in-flight
 * mappers settle.
 */
export async function mapLimit<T, R>(
  items: readonly T[],
  mapper: (item: T, index: number) => Promise<R>,
  options: MapLimitOptions,
): Promise<R[]> {
  const concurrency = Math.max(1, Math.floor(options.concurrency));
  const results: R[] = [];
  let nextIndex = 0;
  const failures: unknown[] = [];

  async function worker(): Promise<void> {
    while (failures.length === 0 && nextIndex < items.length) {
      const index = nextIndex;
      nextIndex += 1;

      const item = items[index];
      if (item === undefined) {
        continue;
      }

      try {
        results[index] = await mapper(item, index);
      } catch (error) {
        failures.push(error);
      }
    }
  }

  const workerCount = Math.min(concurrency, items.length);
  await Promise.all(Array.from({ length: workerCount }, () => worker()));

  if (failures.length > 0) {
    throw failures[0];
  }

  return results;
}
