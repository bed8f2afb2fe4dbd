/**
 * WorkerPool - bounded-concurrency task runner
 *
 * Runs a processor over a list of items with at most `concurrency` in flight.
 * A failing item never affects its siblings: every item yields an outcome.
 * Supports stopping, after which no new item is started.
 */

/**
 * Result of processing one item
 */
export type TaskOutcome<T, R> = { item: T; ok: true; value: R } | { item: T; ok: false; error: unknown };

export class WorkerPool<T, R> {
  private pending: Array<{ item: T; index: number }> = [];
  private stopped = false;

  /**
   * @param concurrency - Maximum number of items processed at once (at least 1)
   * @param processor - Function to process each item
   */
  constructor(
    private readonly concurrency: number,
    private readonly processor: (item: T) => Promise<R>,
  ) {
    if (!Number.isInteger(concurrency) || concurrency < 1) {
      throw new Error(`Concurrency must be a positive integer, got ${concurrency}`);
    }
  }

  /**
   * Process all items and wait for them to settle
   *
   * @returns One outcome per started item, in input order. Items skipped
   *   because the pool was stopped are not included.
   */
  async run(items: readonly T[]): Promise<TaskOutcome<T, R>[]> {
    if (this.stopped) {
      throw new Error('Cannot run a stopped pool');
    }

    const outcomes: Array<TaskOutcome<T, R> | undefined> = new Array(items.length);
    this.pending.push(...items.map((item, index) => ({ item, index })));

    const workers: Promise<void>[] = [];
    const workerCount = Math.min(this.concurrency, items.length);
    for (let i = 0; i < workerCount; i++) {
      workers.push(this.work(outcomes));
    }
    await Promise.all(workers);

    return outcomes.filter((outcome): outcome is TaskOutcome<T, R> => outcome !== undefined);
  }

  /**
   * Stop starting new items. Items already in flight finish normally.
   */
  stop(): void {
    this.stopped = true;
    this.pending = [];
  }

  isStopped(): boolean {
    return this.stopped;
  }

  private async work(outcomes: Array<TaskOutcome<T, R> | undefined>): Promise<void> {
    let next = this.pending.shift();
    while (next && !this.stopped) {
      const { item, index } = next;
      try {
        // biome-ignore lint/performance/noAwaitInLoops: each worker handles one item at a time
        const value = await this.processor(item);
        outcomes[index] = { item, ok: true, value };
      } catch (error) {
        outcomes[index] = { item, ok: false, error };
      }
      next = this.pending.shift();
    }
  }
}

/**
 * Map over items with bounded concurrency
 */
export function mapConcurrent<T, R>(
  items: readonly T[],
  concurrency: number,
  processor: (item: T) => Promise<R>,
): Promise<TaskOutcome<T, R>[]> {
  return new WorkerPool(concurrency, processor).run(items);
}
