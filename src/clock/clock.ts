import { performance } from 'node:perf_hooks';

/** Milliseconds on some clock's timeline; only differences are meaningful */
export type Instant = number;

/**
 * Source of the current time for an executor.
 * `now()` must never go backwards.
 */
export interface Clock {
  now(): Instant;
}

/**
 * Monotonic clock backed by `performance.now()`; unaffected by changes to
 * the system time.
 */
export const monotonicClock: Clock = {
  now: () => performance.now(),
};

/**
 * Wall clock backed by `Date.now()`. Follows fake timers in tests, and
 * system time adjustments everywhere else.
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Milliseconds from `now` until `instant`, never negative
 */
export function delayUntil(clock: Clock, instant: Instant): number {
  return Math.max(0, instant - clock.now());
}
