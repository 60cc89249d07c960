/**
 * Maps `items` through `fn` with at most `concurrency` calls in flight. Results are placed by
 * input index, so output order never depends on completion order.
 *
 * The first failure aborts the signal handed to the other calls, waits for every started call
 * to settle, then rethrows that first failure.
 */
export async function mapOrdered<T, R>(
  items: readonly T[],
  concurrency: number,
  signal: AbortSignal | undefined,
  fn: (item: T, index: number, signal: AbortSignal) => Promise<R>
): Promise<R[]> {
  const limit = Math.max(1, Math.floor(concurrency));
  const controller = new AbortController();
  const onParentAbort = () => controller.abort(signal?.reason);
  if (signal?.aborted) controller.abort(signal.reason);
  else signal?.addEventListener("abort", onParentAbort, { once: true });

  const results = new Array<R>(items.length);
  const failures: unknown[] = [];
  let nextIndex = 0;

  async function worker(): Promise<void> {
    while (failures.length === 0 && nextIndex < items.length) {
      if (controller.signal.aborted) {
        failures.push(new Error("Cancelled"));
        return;
      }
      const index = nextIndex++;
      try {
        results[index] = await fn(items[index], index, controller.signal);
      } catch (err) {
        failures.push(err);
        controller.abort();
        return;
      }
    }
  }

  try {
    const workers = Array.from({ length: Math.min(limit, items.length) }, () => worker());
    await Promise.all(workers);
  } finally {
    signal?.removeEventListener("abort", onParentAbort);
  }

  if (failures.length > 0) throw failures[0];
  return results;
}
