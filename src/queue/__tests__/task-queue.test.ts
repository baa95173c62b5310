import { describe, expect, it } from 'vitest';
import { TaskQueue } from '../task-queue.js';
import { WorkerPool } from '../worker-pool.js';

interface ProductTask {
  product: number;
}

interface BoardTask {
  product: number;
  board: number;
}

const tick = () => new Promise<void>((resolve) => setImmediate(resolve));

describe('TaskQueue', () => {
  it('hands tasks out in FIFO order and counts what was put', async () => {
    const queue = new TaskQueue<ProductTask>('products');
    queue.put({ product: 1 });
    queue.put({ product: 2 });

    expect(await queue.get()).toEqual({ product: 1 });
    expect(await queue.get()).toEqual({ product: 2 });
    expect(queue.stats()).toEqual({ pending: 0, unfinished: 2, totalEnqueued: 2 });
  });

  it('joins only after every task is acknowledged', async () => {
    const queue = new TaskQueue<ProductTask>('products');
    queue.put({ product: 1 });
    queue.put({ product: 2 });

    let joined = false;
    const join = queue.join().then(() => {
      joined = true;
    });

    queue.taskDone();
    await tick();
    expect(joined).toBe(false);

    queue.taskDone();
    await join;
    expect(joined).toBe(true);
  });

  it('releases waiting consumers when closed', async () => {
    const queue = new TaskQueue<ProductTask>('products');
    const waiting = queue.get();

    queue.close();

    expect(await waiting).toBeUndefined();
    expect(await queue.get()).toBeUndefined();
    expect(() => queue.put({ product: 3 })).toThrow('Queue products is closed');
  });

  it('rejects an acknowledgement without a task', () => {
    const queue = new TaskQueue<ProductTask>('products');
    expect(() => queue.taskDone()).toThrow('taskDone() called too many times on queue products');
  });
});

describe('WorkerPool', () => {
  it('sees every board task by the time the product queue joins', async () => {
    const productQueue = new TaskQueue<ProductTask>('products');
    const boardQueue = new TaskQueue<BoardTask>('boards');
    const processedBoards: BoardTask[] = [];

    const productPool = new WorkerPool<ProductTask>({
      queue: productQueue,
      size: 1,
      handler: async (task) => {
        for (let board = 1; board <= 2; board++) {
          await tick();
          boardQueue.put({ product: task.product, board });
        }
      },
    });
    const boardPool = new WorkerPool<BoardTask>({
      queue: boardQueue,
      size: 3,
      handler: async (task) => {
        await tick();
        processedBoards.push(task);
      },
    });

    productPool.start();
    boardPool.start();
    for (let product = 1; product <= 5; product++) {
      productQueue.put({ product });
    }

    await productQueue.join();
    expect(boardQueue.stats().totalEnqueued).toBe(10);

    await boardQueue.join();
    expect(processedBoards).toHaveLength(10);

    await Promise.all([productPool.stop(), boardPool.stop()]);
    expect(productPool.stats()).toEqual({ processed: 5, failed: 0 });
    expect(boardPool.stats()).toEqual({ processed: 10, failed: 0 });
  });

  it('keeps draining after a task fails', async () => {
    const queue = new TaskQueue<ProductTask>('products');
    const handled: number[] = [];
    const pool = new WorkerPool<ProductTask>({
      queue,
      size: 2,
      handler: async (task) => {
        if (task.product === 2) {
          throw new Error('bad page');
        }
        handled.push(task.product);
      },
    });

    pool.start();
    queue.put({ product: 1 });
    queue.put({ product: 2 });
    queue.put({ product: 3 });

    await queue.join();
    await pool.stop();

    expect(handled.sort()).toEqual([1, 3]);
    expect(pool.stats()).toEqual({ processed: 3, failed: 1 });
  });
});
