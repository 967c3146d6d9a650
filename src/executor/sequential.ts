import { EXECUTOR_DEFAULTS } from '../config/constants.js';
import { BaseExecutor } from './base.js';
import type { TaskSlot } from './slot.js';
import type { ExecutorOptions, RunOutcome } from './types.js';

/**
 * Runs every task on the coordinator itself, one at a time. A long run
 * delays the fires of every other slot until it completes.
 */
export class SequentialExecutor extends BaseExecutor {
  constructor(options: ExecutorOptions = {}) {
    super(options, EXECUTOR_DEFAULTS.NAME);
  }

  protected async dispatch(slot: TaskSlot, run: () => Promise<RunOutcome>): Promise<void> {
    const outcome = await run();
    this.completeRun(slot.id, outcome);
  }

  protected awaitWorkers(): Promise<void> {
    return Promise.resolve();
  }

  protected closeWorkers(): void {}
}
