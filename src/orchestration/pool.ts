/**
 * Whether `signal` exists and has aborted. A function call keeps the
 * compiler from narrowing `aborted` across an await.
 */
export function isAborted(signal?: AbortSignal): boolean {
  return signal?.aborted === true;
}

/**
 * Bounded-concurrency map. Results land at the index of their input,
 * so output order never depends on completion order. Once `signal`
 * aborts, workers stop taking new items; the caller decides what a
 * partial result means.
 */
export async function mapWithConcurrency<T, R>(
  items: readonly T[],
  limit: number,
  fn: (item: T, index: number) => Promise<R>,
  signal?: AbortSignal,
): Promise<R[]> {
  const results = new Array<R>(items.length);
  // One iterator shared by every worker hands out each index exactly once.
  const queue = items.entries();

  async function worker(): Promise<void> {
    for (const [index, item] of queue) {
      if (isAborted(signal)) {
        return;
      }
      results[index] = await fn(item, index);
    }
  }

  const workers = Math.max(1, Math.min(Math.floor(limit), items.length));
  await Promise.all(Array.from({ length: workers }, () => worker()));
  return results;
}
