import pLimit, { type LimitFunction } from "p-limit";

/**
 * Bounded pool shared by every level of the crawl. At most `size` tasks run
 * at once; the rest wait in FIFO order for a free slot.
 */
export class WorkerPool {
  private readonly limit: LimitFunction;

  constructor(readonly size: number) {
    if (!Number.isInteger(size) || size < 1) {
      throw new Error(`Worker pool size must be a positive integer, got ${size}`);
    }
    this.limit = pLimit(size);
  }

  run<T>(task: () => Promise<T>): Promise<T> {
    return this.limit(task);
  }
}
