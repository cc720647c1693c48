/**
 * Execute asynchronous work with bounded concurrency while preserving the input
 * ordering in the returned result array.
 */
export async function runWithConcurrency<TInput, TOutput>(
  items: readonly TInput[],
  requestedConcurrency: number,
  worker: (item: TInput, index: number) => Promise<TOutput>
): Promise<TOutput[]> {
  if (items.length === 0) {
    return [];
  }

  const concurrency = normalizeConcurrency(requestedConcurrency, items.length);
  const results = new Array<TOutput>(items.length);
  const queue = items.entries();

  async function runWorker(): Promise<void> {
    for (const [index, item] of queue) {
      results[index] = await worker(item, index);
    }
  }

  const workers = Array.from({ length: concurrency }, () => runWorker());
  await Promise.all(workers);
  return results;
}

/** Clamp caller-provided concurrency to a positive integer no larger than the item count. */
function normalizeConcurrency(requestedConcurrency: number, maxItems: number): number {
  if (!Number.isFinite(requestedConcurrency)) {
    return 1;
  }

  const rounded = Math.floor(requestedConcurrency);
  if (rounded <= 0) {
    return 1;
  }

  return Math.min(rounded, Math.max(1, maxItems));
}
