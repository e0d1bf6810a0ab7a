/**
 * Run `worker` over `items` with at most `concurrency` calls in flight.
 * Resolves once every worker has settled; a rejecting worker rejects the pool.
 */
export async function runPool<T>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<void>,
): Promise<void> {
  const size = Math.max(1, Math.min(Math.floor(concurrency), items.length));
  let next = 0;

  const lane = async (): Promise<void> => {
    while (next < items.length) {
      const index = next++;
      const item = items[index];
      if (item === undefined) continue;
      await worker(item, index);
    }
  };

  const lanes: Array<Promise<void>> = [];
  for (let i = 0; i < size; i++) {
    lanes.push(lane());
  }
  await Promise.all(lanes);
}
