/**
 * Bounded pool of concurrent workers
 *
 * Each item is handed to exactly one worker slot and processed there end
 * to end. Once the signal aborts no further items are dispatched; items
 * already running are left to settle.
 *
 * @module main/pipeline/WorkerPool
 */

export type PoolResult<R> =
  | { status: 'fulfilled'; value: R }
  | { status: 'rejected'; reason: unknown }
  | { status: 'skipped' };

export type PoolWorker<T, R> = (item: T, slot: number) => Promise<R>;

export class WorkerPool {
  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`Worker pool size must be a positive integer, got ${size}`);
    }
  }

  /**
   * Process every item with at most `size` workers running at once
   *
   * @returns One result per item, in input order
   */
  async run<T, R>(items: readonly T[], worker: PoolWorker<T, R>, signal?: AbortSignal): Promise<PoolResult<R>[]> {
    const results = items.map((): PoolResult<R> => ({ status: 'skipped' }));
    let next = 0;

    const drain = async (slot: number): Promise<void> => {
      while (next < items.length && !signal?.aborted) {
        const position = next++;
        try {
          results[position] = { status: 'fulfilled', value: await worker(items[position], slot) };
        } catch (reason) {
          results[position] = { status: 'rejected', reason };
        }
      }
    };

    const slots = Math.min(this.size, items.length);
    await Promise.all(Array.from({ length: slots }, (_, slot) => drain(slot)));
    return results;
  }
}
