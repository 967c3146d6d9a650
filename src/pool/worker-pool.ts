import { ConfigurationError, PoolClosedError } from '../errors/index.js';
import { POOL_DEFAULTS } from '../config/constants.js';

/** Unit of work submitted to a pool */
export type Job<T> = () => Promise<T> | T;

/**
 * Runs submitted jobs asynchronously with bounded concurrency
 */
export interface WorkerPool {
  readonly name: string;
  readonly size: number;
  /** Jobs currently running */
  readonly active: number;
  /** Jobs waiting for a free worker */
  readonly queued: number;
  readonly closed: boolean;
  /**
   * Queue a job. Throws PoolClosedError once the pool is closed; the
   * returned promise settles with the job's outcome.
   */
  submit<T>(job: Job<T>): Promise<T>;
  /** Resolves once nothing is running or queued */
  drain(): Promise<void>;
  /**
   * Stop accepting jobs and reject the queued ones. Running jobs are not
   * interrupted and are not waited for.
   */
  close(): void;
}

interface QueueEntry {
  run: () => Promise<void>;
  reject: (error: unknown) => void;
}

/**
 * FIFO pool with at most `size` jobs in flight
 */
export class BoundedWorkerPool implements WorkerPool {
  readonly name: string;
  readonly size: number;
  private queue: QueueEntry[] = [];
  private running = 0;
  private isClosed = false;
  private idleWaiters: Array<() => void> = [];

  constructor(size: number = POOL_DEFAULTS.SIZE, name = `${POOL_DEFAULTS.PREFIX}pool`) {
    if (!Number.isInteger(size) || size <= 0) {
      throw new ConfigurationError(`poolSize must be a positive integer, got ${size}`, 'poolSize', size);
    }
    this.size = size;
    this.name = name;
  }

  get active(): number {
    return this.running;
  }

  get queued(): number {
    return this.queue.length;
  }

  get closed(): boolean {
    return this.isClosed;
  }

  submit<T>(job: Job<T>): Promise<T> {
    if (this.isClosed) {
      throw new PoolClosedError(this.name);
    }

    return new Promise<T>((resolve, reject) => {
      this.queue.push({
        run: async () => {
          try {
            resolve(await job());
          } catch (error) {
            reject(error);
          }
        },
        reject,
      });
      this.pump();
    });
  }

  drain(): Promise<void> {
    if (this.isIdle()) {
      return Promise.resolve();
    }
    return new Promise((resolve) => {
      this.idleWaiters.push(resolve);
    });
  }

  close(): void {
    if (this.isClosed) return;
    this.isClosed = true;

    const abandoned = this.queue;
    this.queue = [];
    for (const entry of abandoned) {
      entry.reject(new PoolClosedError(this.name));
    }
    this.notifyIfIdle();
  }

  private pump(): void {
    while (this.running < this.size) {
      const entry = this.queue.shift();
      if (!entry) break;

      this.running++;
      void this.execute(entry);
    }
  }

  private async execute(entry: QueueEntry): Promise<void> {
    try {
      await entry.run();
    } finally {
      this.running--;
      this.pump();
      this.notifyIfIdle();
    }
  }

  private isIdle(): boolean {
    return this.running === 0 && this.queue.length === 0;
  }

  private notifyIfIdle(): void {
    if (!this.isIdle()) return;

    const waiters = this.idleWaiters;
    this.idleWaiters = [];
    for (const resolve of waiters) {
      resolve();
    }
  }
}
