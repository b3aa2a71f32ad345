/**
 * Bounded worker pool. Workers pull items in order; once the signal aborts no
 * new item is started, but items already running finish.
 *
 * @module @docpilot/rag/concurrency/pool
 */

export interface PoolOptions {
  signal?: AbortSignal;
  /** Checked before each item; returning true stops dispatching */
  shouldStop?: () => boolean;
}

export interface PoolResult {
  /** Items that were handed to a worker */
  started: number;
  /** True when dispatching stopped before every item was started */
  interrupted: boolean;
}

export async function runWithConcurrency<T>(
  items: readonly T[],
  limit: number,
  worker: (item: T, index: number) => Promise<void>,
  options: PoolOptions = {}
): Promise<PoolResult> {
  let cursor = 0;
  let interrupted = false;

  const stopRequested = () => Boolean(options.signal?.aborted) || Boolean(options.shouldStop?.());

  const lane = async () => {
    while (cursor < items.length) {
      if (stopRequested()) {
        interrupted = true;
        return;
      }
      const index = cursor++;
      await worker(items[index], index);
    }
  };

  const lanes = Array.from({ length: Math.max(1, Math.min(limit, items.length)) }, () => lane());
  await Promise.all(lanes);

  return { started: cursor, interrupted };
}
