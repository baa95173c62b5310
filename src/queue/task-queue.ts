/**
 * Unbounded FIFO task queue with completion tracking
 *
 * `join()` resolves once every task ever put has been acknowledged with
 * `taskDone()`. `close()` releases idle consumers: pending and future `get()`
 * calls resolve to undefined once the queue is empty.
 */

export interface QueueStats {
  /** Tasks waiting to be taken */
  pending: number;
  /** Tasks put but not yet acknowledged */
  unfinished: number;
  /** Tasks put since the queue was created */
  totalEnqueued: number;
}

export class TaskQueue<T extends object> {
  private readonly items: T[] = [];
  private readonly waiters: Array<(item: T | undefined) => void> = [];
  private readonly joiners: Array<() => void> = [];
  private unfinished = 0;
  private totalEnqueued = 0;
  private closed = false;

  constructor(readonly name: string) {}

  put(item: T): void {
    if (this.closed) {
      throw new Error(`Queue ${this.name} is closed`);
    }

    this.unfinished += 1;
    this.totalEnqueued += 1;

    const waiter = this.waiters.shift();
    if (waiter) {
      waiter(item);
    } else {
      this.items.push(item);
    }
  }

  /**
   * Next task, waiting while the queue is empty; undefined once closed and drained
   */
  get(): Promise<T | undefined> {
    const item = this.items.shift();
    if (item !== undefined) {
      return Promise.resolve(item);
    }
    if (this.closed) {
      return Promise.resolve(undefined);
    }
    return new Promise((resolve) => {
      this.waiters.push(resolve);
    });
  }

  taskDone(): void {
    if (this.unfinished <= 0) {
      throw new Error(`taskDone() called too many times on queue ${this.name}`);
    }

    this.unfinished -= 1;
    if (this.unfinished === 0) {
      for (const resolve of this.joiners.splice(0)) {
        resolve();
      }
    }
  }

  join(): Promise<void> {
    if (this.unfinished === 0) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.joiners.push(resolve);
    });
  }

  close(): void {
    this.closed = true;
    for (const waiter of this.waiters.splice(0)) {
      waiter(undefined);
    }
  }

  get isClosed(): boolean {
    return this.closed;
  }

  stats(): QueueStats {
    return {
      pending: this.items.length,
      unfinished: this.unfinished,
      totalEnqueued: this.totalEnqueued,
    };
  }
}
