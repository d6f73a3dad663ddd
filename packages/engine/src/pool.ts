/**
 * Fixed-size worker pool.
 *
 * `concurrency` workers pull items from a shared cursor until the list is
 * drained or the signal aborts. Each item's outcome is recorded at its own
 * index; one failing item never stops the others.
 */

export interface PoolOptions {
  concurrency: number;
  signal?: AbortSignal;
}

export type PoolOutcome<R> =
  | { status: "fulfilled"; value: R }
  | { status: "rejected"; reason: unknown }
  | { status: "skipped" };

export async function runPool<T, R>(
  items: readonly T[],
  worker: (item: T, index: number) => Promise<R>,
  options: PoolOptions,
): Promise<PoolOutcome<R>[]> {
  const outcomes = items.map((): PoolOutcome<R> => ({ status: "skipped" }));
  const size = Math.max(1, Math.min(options.concurrency, items.length));
  let cursor = 0;

  const loop = async (): Promise<void> => {
    while (cursor < items.length && !options.signal?.aborted) {
      const index = cursor++;
      try {
        outcomes[index] = { status: "fulfilled", value: await worker(items[index], index) };
      } catch (reason) {
        outcomes[index] = { status: "rejected", reason };
      }
    }
  };

  await Promise.all(Array.from({ length: size }, () => loop()));
  return outcomes;
}
