import { monotonicClock, delayUntil, type Clock } from '../clock/index.js';
import { EXECUTOR_DEFAULTS } from '../config/constants.js';
import {
  ConfigurationError,
  SchedulerError,
  TaskFault,
  describeCause,
  isSchedulerError,
} from '../errors/index.js';
import { createStructuredLogger, type StructuredLogger } from '../observability/index.js';
import {
  fixedInterval,
  fixedRate,
  formatPolicy,
  missedFires,
  validatePolicy,
  type Duration,
  type SchedulePolicy,
} from '../policy/index.js';
import { TimerBridge } from '../timer/index.js';
import { CancellationHandle } from './handle.js';
import { Mailbox } from './mailbox.js';
import { TaskSlot } from './slot.js';
import type {
  ExecutorCallbacks,
  ExecutorOptions,
  ExecutorState,
  RunEvent,
  RunOutcome,
  ScheduleOptions,
  ShutdownOptions,
  SlotInfo,
  Task,
  TaskContext,
  TaskScheduler,
} from './types.js';

/** Work for the coordinator, the only code that touches the registry */
type CoordinatorMessage =
  | { kind: 'register'; slot: TaskSlot }
  | { kind: 'fire'; slotId: string }
  | { kind: 'complete'; slotId: string; outcome: RunOutcome }
  | { kind: 'cancel'; slotId: string };

/**
 * Shared machinery of both executors: registration, timers, cancellation,
 * fault reporting and shutdown. Subclasses decide where runs execute.
 */
export abstract class BaseExecutor implements TaskScheduler {
  readonly name: string;
  protected readonly clock: Clock;
  protected readonly logger: StructuredLogger;
  private readonly callbacks: ExecutorCallbacks;
  private readonly drainOnShutdown: boolean;
  private readonly bridge: TimerBridge;
  private readonly mailbox: Mailbox<CoordinatorMessage>;
  private readonly registry: Map<string, TaskSlot> = new Map();
  private sequence = 0;
  private lifecycle: ExecutorState = 'running';
  private shutdownPromise?: Promise<void>;

  constructor(options: ExecutorOptions, defaultName: string) {
    const name = options.name ?? defaultName;
    if (name.trim() === '') {
      throw new ConfigurationError('Executor name must not be empty', 'name', name);
    }

    this.name = name;
    this.clock = options.clock ?? monotonicClock;
    this.callbacks = options.callbacks ?? {};
    this.drainOnShutdown = options.drainOnShutdown ?? EXECUTOR_DEFAULTS.DRAIN_ON_SHUTDOWN;
    this.bridge = new TimerBridge(options.timer);

    const base =
      options.logger ??
      createStructuredLogger({
        prefix: name,
        level: options.logLevel ?? EXECUTOR_DEFAULTS.LOG_LEVEL,
      });
    this.logger = base.child({ executor: name });
    if (options.logger && options.logLevel) {
      this.logger.setLevel(options.logLevel);
    }

    this.mailbox = new Mailbox<CoordinatorMessage>(
      (message) => this.handle(message),
      (error) => this.fail(error)
    );
  }

  /**
   * Where a started run executes. Implementations hand the outcome back
   * through `completeRun` (same turn) or `postCompletion` (from elsewhere).
   */
  protected abstract dispatch(slot: TaskSlot, run: () => Promise<RunOutcome>): Promise<void>;

  /** Wait for runs dispatched but not yet completed */
  protected abstract awaitWorkers(): Promise<void>;

  /** Release worker resources without waiting */
  protected abstract closeWorkers(): void;

  // ============================================================================
  // Registration
  // ============================================================================

  /**
   * Register a task under a policy. Returns immediately; the slot becomes
   * visible to `getSlot` once the coordinator has processed it.
   *
   * Throws ConfigurationError for an invalid policy. After shutdown the
   * returned handle is already cancelled and the task never runs.
   */
  schedule(task: Task, policy: SchedulePolicy, options: ScheduleOptions = {}): CancellationHandle {
    validatePolicy(policy);

    const id = `${this.name}-${++this.sequence}`;
    const handle = new CancellationHandle(id, (slotId) => {
      this.mailbox.post({ kind: 'cancel', slotId });
    });

    if (this.lifecycle !== 'running') {
      handle.cancel();
      this.logger.warn(`Registration refused, executor is ${this.lifecycle}`, {
        slotId: id,
        slotName: options.name,
      });
      return handle;
    }

    const slot = new TaskSlot({
      id,
      name: options.name,
      policy,
      task,
      handle,
      registeredAt: this.clock.now(),
    });
    this.mailbox.post({ kind: 'register', slot });
    return handle;
  }

  /**
   * Run `task` after `initialDelay`, then `period` after each run completes
   */
  scheduleFixedInterval(
    task: Task,
    initialDelay: Duration,
    period: Duration,
    options?: ScheduleOptions
  ): CancellationHandle {
    return this.schedule(task, fixedInterval(period, initialDelay), options);
  }

  /**
   * Run `task` at `initialDelay + k * period`. Fires missed while a run
   * overran collapse into one run at the next grid point.
   */
  scheduleFixedRate(
    task: Task,
    initialDelay: Duration,
    period: Duration,
    options?: ScheduleOptions
  ): CancellationHandle {
    return this.schedule(task, fixedRate(period, initialDelay), options);
  }

  // ============================================================================
  // Introspection
  // ============================================================================

  get state(): ExecutorState {
    return this.lifecycle;
  }

  /** Registered slots that are not cancelled yet */
  get activeSlots(): number {
    return this.registry.size;
  }

  getSlot(slotId: string): SlotInfo | undefined {
    return this.registry.get(slotId)?.info();
  }

  getSlots(): SlotInfo[] {
    return [...this.registry.values()].map((slot) => slot.info());
  }

  /**
   * Resolves once the coordinator has handled every pending message
   */
  whenIdle(): Promise<void> {
    return this.mailbox.whenIdle();
  }

  // ============================================================================
  // Shutdown
  // ============================================================================

  /**
   * Cancel every slot and stop the executor. With `drain` (the default
   * unless configured otherwise) the promise resolves after in-flight runs
   * complete; without it in-flight runs are abandoned. Repeated calls
   * return the same promise.
   */
  shutdown(options: ShutdownOptions = {}): Promise<void> {
    if (!this.shutdownPromise) {
      this.shutdownPromise = this.terminate(options.drain ?? this.drainOnShutdown);
    }
    return this.shutdownPromise;
  }

  private async terminate(drain: boolean): Promise<void> {
    if (this.lifecycle === 'failed') {
      this.closeWorkers();
      return;
    }

    this.lifecycle = 'shutting-down';
    const span = this.logger.span('shutdown');
    span.addContext({ drain, slots: this.registry.size });

    for (const slot of this.registry.values()) {
      slot.handle.cancel();
    }
    this.bridge.dispose();

    if (drain) {
      await this.awaitWorkers();
      await this.mailbox.whenIdle();
    }

    for (const message of this.mailbox.close()) {
      if (message.kind === 'register') {
        message.slot.handle.cancel();
      }
    }
    this.closeWorkers();

    const abandoned = this.registry.size;
    this.registry.clear();
    this.lifecycle = 'terminated';
    span.end();
    this.logger.info('Executor shut down', { drain, abandoned });
  }

  // ============================================================================
  // Coordinator
  // ============================================================================

  /** Hand a run's outcome to the coordinator from outside it */
  protected postCompletion(slotId: string, outcome: RunOutcome): void {
    this.mailbox.post({ kind: 'complete', slotId, outcome });
  }

  /** Apply a run's outcome while the coordinator is handling its fire */
  protected completeRun(slotId: string, outcome: RunOutcome): void {
    this.complete(slotId, outcome);
  }

  private async handle(message: CoordinatorMessage): Promise<void> {
    switch (message.kind) {
      case 'register':
        this.register(message.slot);
        return;
      case 'fire':
        await this.fire(message.slotId);
        return;
      case 'complete':
        this.complete(message.slotId, message.outcome);
        return;
      case 'cancel':
        this.cancelSlot(message.slotId);
        return;
    }
  }

  private register(slot: TaskSlot): void {
    if (this.lifecycle !== 'running' || slot.handle.isCancelled) {
      slot.handle.cancel();
      slot.cancel();
      this.logger.debug('Slot cancelled before registration', this.slotContext(slot));
      this.invoke('onSlotCancelled', () => this.callbacks.onSlotCancelled?.(slot.info()));
      return;
    }

    this.registry.set(slot.id, slot);
    this.logger.debug(`Registered ${formatPolicy(slot.policy)}`, this.slotContext(slot));
    this.arm(slot);
  }

  private arm(slot: TaskSlot): void {
    const delay = delayUntil(this.clock, slot.nextFireAt);
    slot.timerId = this.bridge.arm(
      delay,
      () => {
        this.mailbox.post({ kind: 'fire', slotId: slot.id });
      },
      (error) => this.fail(error)
    );
  }

  private async fire(slotId: string): Promise<void> {
    const slot = this.registry.get(slotId);
    if (!slot) return;

    slot.timerId = undefined;
    const now = this.clock.now();
    if (now < slot.nextFireAt && !slot.handle.isCancelled) {
      this.logger.debug(
        `Timer woke ${slot.nextFireAt - now}ms early, re-arming`,
        this.slotContext(slot)
      );
      this.arm(slot);
      return;
    }

    if (!slot.begin(now)) {
      this.retire(slot);
      return;
    }

    await this.dispatch(slot, () => this.execute(slot));
  }

  private async execute(slot: TaskSlot): Promise<RunOutcome> {
    const startedAt = this.clock.now();
    const context: TaskContext = {
      slotId: slot.id,
      name: slot.name,
      run: slot.runCount,
      scheduledAt: slot.nextFireAt,
      startedAt,
      handle: slot.handle,
      scheduler: this,
    };

    const span = this.logger.span('run');
    span.addContext({ ...this.slotContext(slot), run: context.run });
    this.invoke('onRunStarted', () =>
      this.callbacks.onRunStarted?.({
        slotId: slot.id,
        name: slot.name,
        run: context.run,
        scheduledAt: context.scheduledAt,
        startedAt,
      })
    );

    try {
      await slot.task(context);
      return { status: 'completed', startedAt, finishedAt: this.clock.now() };
    } catch (error) {
      return { status: 'faulted', startedAt, finishedAt: this.clock.now(), error };
    } finally {
      span.end();
    }
  }

  private complete(slotId: string, outcome: RunOutcome): void {
    const slot = this.registry.get(slotId);
    if (!slot) return;

    const event: RunEvent = {
      slotId: slot.id,
      name: slot.name,
      run: slot.runCount,
      scheduledAt: slot.nextFireAt,
      startedAt: outcome.startedAt,
      finishedAt: outcome.finishedAt,
      duration: outcome.finishedAt - outcome.startedAt,
    };

    if (outcome.status === 'faulted') {
      const fault = new TaskFault(slot.id, slot.runCount, outcome.error, slot.name);
      event.fault = fault;
      this.logger.warn(fault.message, { ...this.slotContext(slot), run: slot.runCount });
      this.invoke('onFault', () => this.callbacks.onFault?.(fault, event));
    }
    this.invoke('onRunCompleted', () => this.callbacks.onRunCompleted?.(event));

    const now = this.clock.now();
    const missed = missedFires(slot.policy, {
      scheduledAt: slot.nextFireAt,
      startedAt: outcome.startedAt,
      finishedAt: outcome.finishedAt,
      now,
    });

    const next = slot.finish(outcome, now);
    if (next === null) {
      this.retire(slot);
      return;
    }

    if (missed > 0) {
      this.logger.warn(`Run overran its period, collapsed ${missed} missed fire(s)`, {
        ...this.slotContext(slot),
        nextFireAt: next,
      });
    }
    this.arm(slot);
  }

  private cancelSlot(slotId: string): void {
    const slot = this.registry.get(slotId);
    // A running slot sees its flag when the run completes
    if (!slot || !slot.cancel()) return;
    this.retire(slot);
  }

  /** Drop a cancelled slot from the registry */
  private retire(slot: TaskSlot): void {
    if (slot.timerId !== undefined) {
      this.bridge.disarm(slot.timerId);
      slot.timerId = undefined;
    }
    this.registry.delete(slot.id);

    this.logger.debug('Slot cancelled', this.slotContext(slot));
    this.invoke('onSlotCancelled', () => this.callbacks.onSlotCancelled?.(slot.info()));
  }

  /**
   * The coordinator could not continue: cancel everything, stop the timers
   * and report once through onFatal
   */
  private fail(error: unknown): void {
    if (this.lifecycle === 'failed' || this.lifecycle === 'terminated') return;
    this.lifecycle = 'failed';

    const fatal = isSchedulerError(error)
      ? error
      : new SchedulerError(`Coordinator failed: ${describeCause(error)}`, 'INTERNAL', {}, { cause: error });

    this.bridge.dispose();
    for (const message of this.mailbox.close()) {
      if (message.kind === 'register') {
        message.slot.handle.cancel();
      }
    }

    const slots = [...this.registry.values()];
    this.registry.clear();
    for (const slot of slots) {
      slot.handle.cancel();
      slot.cancel();
    }
    this.closeWorkers();

    this.logger.error(`Executor failed, cancelled ${slots.length} slot(s)`, {
      code: fatal.code,
      error: fatal.message,
    });
    this.invoke('onFatal', () => this.callbacks.onFatal?.(fatal));
  }

  private invoke(callback: keyof ExecutorCallbacks, call: () => void): void {
    try {
      call();
    } catch (error) {
      this.logger.error(`Callback ${callback} threw`, { error: describeCause(error) });
    }
  }

  private slotContext(slot: TaskSlot): Record<string, unknown> {
    return { slotId: slot.id, slotName: slot.name };
  }
}
