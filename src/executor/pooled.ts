import { POOL_DEFAULTS } from '../config/constants.js';
import { TimerUnavailableError, describeCause } from '../errors/index.js';
import { BoundedWorkerPool, type WorkerPool } from '../pool/index.js';
import { BaseExecutor } from './base.js';
import type { TaskSlot } from './slot.js';
import type { PooledExecutorOptions, RunOutcome } from './types.js';

/**
 * Hands each run to a worker pool so slots run concurrently, up to the
 * pool size. A slot never overlaps itself: its next fire is only armed
 * once the current run has completed.
 */
export class PooledExecutor extends BaseExecutor {
  private readonly workers: WorkerPool;

  constructor(options: PooledExecutorOptions = {}) {
    super(options, `${POOL_DEFAULTS.PREFIX}executor`);
    this.workers = options.pool ?? new BoundedWorkerPool(options.poolSize ?? POOL_DEFAULTS.SIZE, `${this.name}-pool`);
    this.logger.debug('Worker pool ready', { pool: this.workers.name, size: this.workers.size });
  }

  get pool(): WorkerPool {
    return this.workers;
  }

  protected async dispatch(slot: TaskSlot, run: () => Promise<RunOutcome>): Promise<void> {
    let pending: Promise<RunOutcome>;
    try {
      pending = this.workers.submit(run);
    } catch (error) {
      throw new TimerUnavailableError(
        `Worker pool refused a run of ${slot.id}: ${describeCause(error)}`,
        'dispatch',
        error
      );
    }

    void pending.then(
      (outcome) => this.postCompletion(slot.id, outcome),
      (error: unknown) => {
        this.logger.debug('Queued run abandoned', { slotId: slot.id, error: describeCause(error) });
      }
    );
  }

  protected awaitWorkers(): Promise<void> {
    return this.workers.drain();
  }

  protected closeWorkers(): void {
    this.workers.close();
  }
}
