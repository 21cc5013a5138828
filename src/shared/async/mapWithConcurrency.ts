/**
 * Maps items through an async worker with at most `concurrency` calls in flight.
 * Output order matches input order.
 */
export const mapWithConcurrency = async <T, R>(
  items: readonly T[],
  concurrency: number,
  worker: (item: T, index: number) => Promise<R>,
): Promise<R[]> => {
  const results = new Array<R>(items.length);
  // Lanes pull from one shared iterator so each item is taken exactly once.
  const pending = items.entries();

  const runLane = async (): Promise<void> => {
    for (const [index, item] of pending) {
      results[index] = await worker(item, index);
    }
  };

  const laneCount = Math.max(1, Math.min(concurrency, items.length));
  await Promise.all(Array.from({ length: laneCount }, () => runLane()));

  return results;
};
