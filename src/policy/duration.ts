import { ConfigurationError } from '../errors/index.js';

export type DurationUnit = 'milliseconds' | 'seconds' | 'minutes' | 'hours' | 'days' | 'weeks';

/** A span of time as `{ value, unit }` */
export interface DurationSpec {
  value: number;
  unit: DurationUnit;
}

/** Milliseconds, or a value with a unit */
export type Duration = number | DurationSpec;

const MULTIPLIERS: Record<DurationUnit, number> = {
  milliseconds: 1,
  seconds: 1000,
  minutes: 60 * 1000,
  hours: 60 * 60 * 1000,
  days: 24 * 60 * 60 * 1000,
  weeks: 7 * 24 * 60 * 60 * 1000,
};

/**
 * Convert a duration to milliseconds
 */
export function toMillis(duration: Duration): number {
  if (typeof duration === 'number') {
    return duration;
  }
  return duration.value * MULTIPLIERS[duration.unit];
}

/**
 * Convert a duration to milliseconds, rejecting anything that is not a
 * finite number at or above `min` (or strictly above it when `exclusive`)
 */
export function requireMillis(
  field: string,
  duration: Duration,
  min: number,
  exclusive: boolean
): number {
  const ms = toMillis(duration);

  if (!Number.isFinite(ms)) {
    throw new ConfigurationError(`${field} must be a finite duration, got ${ms}`, field, duration);
  }
  if (exclusive ? ms <= min : ms < min) {
    const bound = exclusive ? `greater than ${min}` : `at least ${min}`;
    throw new ConfigurationError(`${field} must be ${bound}ms, got ${ms}ms`, field, duration);
  }

  return ms;
}

/**
 * Render milliseconds in the largest unit that divides them evenly
 */
export function formatMillis(ms: number): string {
  const units: Array<[string, number]> = [
    ['w', MULTIPLIERS.weeks],
    ['d', MULTIPLIERS.days],
    ['h', MULTIPLIERS.hours],
    ['m', MULTIPLIERS.minutes],
    ['s', MULTIPLIERS.seconds],
  ];

  for (const [suffix, size] of units) {
    if (ms > 0 && ms % size === 0) {
      return `${ms / size}${suffix}`;
    }
  }

  return `${ms}ms`;
}
