import type { Instant } from '../clock/index.js';
import { SchedulerError } from '../errors/index.js';
import { firstFire, nextFire, type SchedulePolicy } from '../policy/index.js';
import type { TimerId } from '../timer/index.js';
import type { CancellationHandle } from './handle.js';
import type { RunOutcome, SlotInfo, SlotState, Task } from './types.js';

export interface TaskSlotInit {
  id: string;
  name?: string;
  policy: SchedulePolicy;
  task: Task;
  handle: CancellationHandle;
  registeredAt: Instant;
}

/**
 * Live state of one registered schedule.
 *
 * States: scheduled -> running -> scheduled ... -> cancelled. The
 * cancellation flag lives in the handle and is consulted on every
 * transition; `cancelled` is terminal.
 */
export class TaskSlot {
  readonly id: string;
  readonly name?: string;
  readonly policy: SchedulePolicy;
  readonly task: Task;
  readonly handle: CancellationHandle;
  readonly registeredAt: Instant;

  /** Pending timer while scheduled */
  timerId?: TimerId;

  private current: SlotState = 'scheduled';
  private scheduledAt: Instant;
  private runs = 0;
  private faults = 0;
  private lastStartedAt?: Instant;
  private lastFinishedAt?: Instant;

  constructor(init: TaskSlotInit) {
    this.id = init.id;
    this.name = init.name;
    this.policy = init.policy;
    this.task = init.task;
    this.handle = init.handle;
    this.registeredAt = init.registeredAt;
    this.scheduledAt = firstFire(init.policy, init.registeredAt);
  }

  get state(): SlotState {
    return this.current;
  }

  /** Instant of the pending fire, or of the current run while running */
  get nextFireAt(): Instant {
    return this.scheduledAt;
  }

  get runCount(): number {
    return this.runs;
  }

  get faultCount(): number {
    return this.faults;
  }

  /**
   * Timer fired. Moves to `running` and returns true, or to `cancelled`
   * and returns false when the flag is set.
   */
  begin(now: Instant): boolean {
    this.expect('scheduled', 'begin');

    if (this.handle.isCancelled) {
      this.current = 'cancelled';
      return false;
    }

    this.current = 'running';
    this.runs++;
    this.lastStartedAt = now;
    return true;
  }

  /**
   * Run ended. Returns the next fire instant, or null when the slot was
   * cancelled meanwhile. Faults do not cancel.
   */
  finish(outcome: RunOutcome, now: Instant): Instant | null {
    this.expect('running', 'finish');

    this.lastStartedAt = outcome.startedAt;
    this.lastFinishedAt = outcome.finishedAt;
    if (outcome.status === 'faulted') {
      this.faults++;
    }

    if (this.handle.isCancelled) {
      this.current = 'cancelled';
      return null;
    }

    this.scheduledAt = nextFire(this.policy, {
      scheduledAt: this.scheduledAt,
      startedAt: outcome.startedAt,
      finishedAt: outcome.finishedAt,
      now,
    });
    this.current = 'scheduled';
    return this.scheduledAt;
  }

  /**
   * Cancel a waiting slot. A running slot is left to observe its flag when
   * the run finishes; returns whether the slot is now cancelled.
   */
  cancel(): boolean {
    if (this.current === 'scheduled') {
      this.current = 'cancelled';
    }
    return this.current === 'cancelled';
  }

  info(): SlotInfo {
    return {
      id: this.id,
      name: this.name,
      policy: this.policy,
      state: this.current,
      runCount: this.runs,
      faultCount: this.faults,
      nextFireAt: this.scheduledAt,
      lastStartedAt: this.lastStartedAt,
      lastFinishedAt: this.lastFinishedAt,
    };
  }

  private expect(state: SlotState, transition: string): void {
    if (this.current !== state) {
      throw new SchedulerError(
        `Slot ${this.id} cannot ${transition} while ${this.current}`,
        'INVALID_TRANSITION',
        { slotId: this.id, state: this.current, transition }
      );
    }
  }
}
