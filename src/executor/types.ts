import type { Clock, Instant } from '../clock/index.js';
import type { SchedulerError, TaskFault } from '../errors/index.js';
import type { LogLevel, StructuredLogger } from '../observability/index.js';
import type { Duration, SchedulePolicy } from '../policy/index.js';
import type { WorkerPool } from '../pool/index.js';
import type { TimerPrimitive } from '../timer/index.js';
import type { CancellationHandle } from './handle.js';

/**
 * Registration surface shared by executors and handed to running tasks
 */
export interface TaskScheduler {
  schedule(task: Task, policy: SchedulePolicy, options?: ScheduleOptions): CancellationHandle;
  scheduleFixedInterval(
    task: Task,
    initialDelay: Duration,
    period: Duration,
    options?: ScheduleOptions
  ): CancellationHandle;
  scheduleFixedRate(
    task: Task,
    initialDelay: Duration,
    period: Duration,
    options?: ScheduleOptions
  ): CancellationHandle;
}

/**
 * Passed to every run of a task
 */
export interface TaskContext {
  slotId: string;
  name?: string;
  /** 1-based run number */
  run: number;
  scheduledAt: Instant;
  startedAt: Instant;
  /** Cancels the slot this run belongs to; the current run still completes */
  handle: CancellationHandle;
  /** Registers more work on the same executor */
  scheduler: TaskScheduler;
}

export type Task = (context: TaskContext) => void | Promise<void>;

export interface ScheduleOptions {
  /** Display name used in logs and faults */
  name?: string;
}

export type SlotState = 'scheduled' | 'running' | 'cancelled';

export type ExecutorState = 'running' | 'shutting-down' | 'terminated' | 'failed';

/**
 * Read-only snapshot of a slot
 */
export interface SlotInfo {
  id: string;
  name?: string;
  policy: SchedulePolicy;
  state: SlotState;
  runCount: number;
  faultCount: number;
  /** Instant of the pending fire, or of the current run while running */
  nextFireAt: Instant;
  lastStartedAt?: Instant;
  lastFinishedAt?: Instant;
}

/**
 * How one run ended
 */
export type RunOutcome =
  | { status: 'completed'; startedAt: Instant; finishedAt: Instant }
  | { status: 'faulted'; startedAt: Instant; finishedAt: Instant; error: unknown };

/**
 * Emitted when a run starts and when it ends
 */
export interface RunEvent {
  slotId: string;
  name?: string;
  run: number;
  scheduledAt: Instant;
  startedAt: Instant;
  finishedAt?: Instant;
  duration?: number;
  fault?: TaskFault;
}

/**
 * Callbacks for executor events. A callback that throws is logged and
 * otherwise ignored.
 */
export interface ExecutorCallbacks {
  onRunStarted?: (event: RunEvent) => void;
  /** Called after every run, faulted or not */
  onRunCompleted?: (event: RunEvent) => void;
  onFault?: (fault: TaskFault, event: RunEvent) => void;
  onSlotCancelled?: (slot: SlotInfo) => void;
  /** Called once when the executor fails and cancels every slot */
  onFatal?: (error: SchedulerError) => void;
}

/**
 * Configuration shared by both executors
 */
export interface ExecutorOptions {
  /** Prefixes slot ids and appears in every log entry */
  name?: string;
  /** Time source (default: monotonic) */
  clock?: Clock;
  /** One-shot timer (default: setTimeout) */
  timer?: TimerPrimitive;
  logger?: StructuredLogger;
  logLevel?: LogLevel;
  callbacks?: ExecutorCallbacks;
  /** Default for `shutdown()` without a `drain` option */
  drainOnShutdown?: boolean;
}

export interface PooledExecutorOptions extends ExecutorOptions {
  /** Concurrent runs (default: 4); ignored when `pool` is given */
  poolSize?: number;
  /** Pool to dispatch to instead of a new BoundedWorkerPool */
  pool?: WorkerPool;
}

export interface ShutdownOptions {
  /** Wait for in-flight runs (true) or abandon them (false) */
  drain?: boolean;
}
