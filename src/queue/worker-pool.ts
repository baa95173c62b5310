/**
 * Fixed-size pool of workers draining one TaskQueue
 */

import { errorMessage } from '../utils/errors.js';
import { componentLogger, type Logger } from '../utils/logger.js';
import type { TaskQueue } from './task-queue.js';

export type TaskHandler<T> = (task: T, workerId: number) => Promise<void>;

export interface WorkerPoolOptions<T extends object> {
  queue: TaskQueue<T>;
  size: number;
  handler: TaskHandler<T>;
  /** Identifies a task in logs */
  describe?: (task: T) => string;
  logger?: Logger;
}

export class WorkerPool<T extends object> {
  private readonly queue: TaskQueue<T>;
  private readonly size: number;
  private readonly handler: TaskHandler<T>;
  private readonly describe: (task: T) => string;
  private readonly logger: Logger;
  private workers: Array<Promise<void>> = [];
  private processed = 0;
  private failed = 0;

  constructor(options: WorkerPoolOptions<T>) {
    this.queue = options.queue;
    this.size = Math.max(1, options.size);
    this.handler = options.handler;
    this.describe = options.describe ?? (() => 'task');
    this.logger = options.logger ?? componentLogger(`${options.queue.name}-workers`);
  }

  start(): void {
    if (this.workers.length > 0) {
      return;
    }
    this.workers = Array.from({ length: this.size }, (_, index) => this.work(index + 1));
    this.logger.info({ queue: this.queue.name, workers: this.size }, 'Workers started');
  }

  /**
   * Close the queue and wait for every worker to finish its current task
   */
  async stop(): Promise<void> {
    this.queue.close();
    await Promise.all(this.workers);
    this.workers = [];
    this.logger.info(
      { queue: this.queue.name, processed: this.processed, failed: this.failed },
      'Workers stopped'
    );
  }

  stats(): { processed: number; failed: number } {
    return { processed: this.processed, failed: this.failed };
  }

  private async work(workerId: number): Promise<void> {
    for (;;) {
      const task = await this.queue.get();
      if (task === undefined) {
        return;
      }

      try {
        await this.handler(task, workerId);
      } catch (error) {
        this.failed += 1;
        this.logger.warn(
          { queue: this.queue.name, workerId, task: this.describe(task), error: errorMessage(error) },
          'Task failed'
        );
      } finally {
        this.processed += 1;
        this.queue.taskDone();
      }
    }
  }
}
