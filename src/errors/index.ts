export type ErrorCode =
  | 'CONFIGURATION'
  | 'TASK_FAULT'
  | 'TIMER_UNAVAILABLE'
  | 'POOL_CLOSED'
  | 'INVALID_TRANSITION'
  | 'INTERNAL';

/**
 * Base class for taskloop errors. `details` carries the structured fields
 * shown by `format()` and merged into log context.
 */
export class SchedulerError extends Error {
  readonly code: ErrorCode;
  readonly details: Record<string, unknown>;

  constructor(
    message: string,
    code: ErrorCode,
    details: Record<string, unknown> = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = 'SchedulerError';
    this.code = code;
    this.details = details;
  }

  /**
   * Format the error with its details for display
   */
  format(): string {
    const lines: string[] = [];

    lines.push(`${this.name}: ${this.message}`);
    for (const [key, value] of Object.entries(this.details)) {
      if (value === undefined) continue;
      lines.push(`  ${key}: ${formatDetail(value)}`);
    }

    if (this.cause !== undefined) {
      lines.push(`  caused by: ${describeCause(this.cause)}`);
    }

    return lines.join('\n');
  }

  toString(): string {
    return this.format();
  }
}

/**
 * Invalid construction or scheduling parameters
 */
export class ConfigurationError extends SchedulerError {
  readonly field: string;
  readonly value: unknown;

  constructor(message: string, field: string, value: unknown) {
    super(message, 'CONFIGURATION', { field, value });
    this.name = 'ConfigurationError';
    this.field = field;
    this.value = value;
  }
}

/**
 * A task threw or rejected while running. Reported, never rethrown.
 */
export class TaskFault extends SchedulerError {
  readonly slotId: string;
  readonly slotName?: string;
  /** 1-based run number that faulted */
  readonly run: number;

  constructor(slotId: string, run: number, cause: unknown, slotName?: string) {
    super(
      `Task ${slotName ? `'${slotName}' (${slotId})` : slotId} failed on run ${run}: ${describeCause(cause)}`,
      'TASK_FAULT',
      { slotId, slotName, run },
      { cause }
    );
    this.name = 'TaskFault';
    this.slotId = slotId;
    this.slotName = slotName;
    this.run = run;
  }
}

/**
 * The timer or the worker pool refused a request. Fatal to the executor.
 */
export class TimerUnavailableError extends SchedulerError {
  readonly operation: 'arm' | 'dispatch';

  constructor(message: string, operation: 'arm' | 'dispatch', cause?: unknown) {
    super(message, 'TIMER_UNAVAILABLE', { operation }, { cause });
    this.name = 'TimerUnavailableError';
    this.operation = operation;
  }
}

export class PoolClosedError extends SchedulerError {
  readonly pool: string;

  constructor(pool: string) {
    super(`Worker pool '${pool}' is closed`, 'POOL_CLOSED', { pool });
    this.name = 'PoolClosedError';
    this.pool = pool;
  }
}

export function isSchedulerError(value: unknown): value is SchedulerError {
  return value instanceof SchedulerError;
}

/**
 * Format multiple errors for display
 */
export function formatErrors(errors: SchedulerError[]): string {
  return errors.map((e) => e.format()).join('\n\n');
}

/**
 * One-line description of an arbitrary thrown value
 */
export function describeCause(cause: unknown): string {
  if (cause instanceof Error) {
    return cause.message;
  }
  if (typeof cause === 'string') {
    return cause;
  }
  return String(cause);
}

function formatDetail(value: unknown): string {
  if (typeof value === 'string') {
    return value;
  }
  if (typeof value === 'number' || typeof value === 'boolean') {
    return String(value);
  }
  return JSON.stringify(value) ?? String(value);
}
