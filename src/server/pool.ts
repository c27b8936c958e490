/**
 * Fixed-size worker pool with an unbounded FIFO queue.
 *
 * Each worker is a named slot; a task runs with the slot's name so its log
 * lines can be attributed. When every slot is busy, submit() queues instead of
 * rejecting.
 */

export type WorkerTask = (workerName: string) => Promise<void>;

export interface WorkerPoolOptions {
  namePrefix?: string;
  onTaskError?: (error: unknown, workerName: string) => void;
}

export class WorkerPool {
  private idle: string[] = [];
  private queue: WorkerTask[] = [];
  private active = 0;
  private drainWaiters: Array<() => void> = [];
  private readonly onTaskError: (error: unknown, workerName: string) => void;

  constructor(
    readonly size: number,
    options: WorkerPoolOptions = {}
  ) {
    if (!Number.isInteger(size) || size < 1) {
      throw new RangeError(`WorkerPool size must be a positive integer, got ${size}`);
    }
    const prefix = options.namePrefix ?? 'HTTPWorker';
    for (let i = 0; i < size; i++) {
      this.idle.push(`${prefix}_${i}`);
    }
    this.onTaskError =
      options.onTaskError ??
      ((error, workerName) => {
        console.error(`[worker-pool] Task on ${workerName} failed:`, error);
      });
  }

  submit(task: WorkerTask): void {
    const worker = this.idle.shift();
    if (worker === undefined) {
      this.queue.push(task);
      return;
    }
    this.run(worker, task);
  }

  /**
   * Resolves once nothing is running or queued.
   */
  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.drainWaiters.push(resolve);
    });
  }

  getActive(): number {
    return this.active;
  }

  getQueued(): number {
    return this.queue.length;
  }

  private isIdle(): boolean {
    return this.active === 0 && this.queue.length === 0;
  }

  private run(worker: string, task: WorkerTask): void {
    this.active++;
    void this.execute(worker, task);
  }

  private async execute(worker: string, task: WorkerTask): Promise<void> {
    try {
      await task(worker);
    } catch (error) {
      this.onTaskError(error, worker);
    } finally {
      this.active--;
      this.release(worker);
    }
  }

  private release(worker: string): void {
    const next = this.queue.shift();
    if (next) {
      this.run(worker, next);
      return;
    }

    this.idle.push(worker);
    if (this.isIdle()) {
      const waiters = this.drainWaiters;
      this.drainWaiters = [];
      for (const resolve of waiters) {
        resolve();
      }
    }
  }
}
