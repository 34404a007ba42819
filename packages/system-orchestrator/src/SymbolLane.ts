import PQueue from 'p-queue';

/**
 * Serial executor per symbol. Tasks for one symbol run one at a time in
 * submission order; different symbols run independently.
 *
 * Lane tasks should only apply state transitions. External calls belong
 * between two lane tasks so a slow service never holds a symbol.
 */
export class SymbolLane {
  private queues: Map<string, PQueue> = new Map();

  run<T>(symbol: string, task: () => T | Promise<T>): Promise<T> {
    return this.queueFor(symbol).add<T>(async () => task());
  }

  /**
   * Tasks queued or running, across all symbols
   */
  get pending(): number {
    let total = 0;
    for (const queue of this.queues.values()) {
      total += queue.size + queue.pending;
    }
    return total;
  }

  async onIdle(): Promise<void> {
    await Promise.all(Array.from(this.queues.values(), queue => queue.onIdle()));
  }

  private queueFor(symbol: string): PQueue {
    let queue = this.queues.get(symbol);
    if (!queue) {
      queue = new PQueue({ concurrency: 1 });
      this.queues.set(symbol, queue);
    }
    return queue;
  }
}
