import type { Instant } from '../clock/index.js';
import { ConfigurationError } from '../errors/index.js';
import { formatMillis, requireMillis, type Duration } from './duration.js';

/**
 * Next fire = completion of the current run + period.
 */
export interface FixedIntervalPolicy {
  kind: 'fixed-interval';
  initialDelay: number;
  period: number;
}

/**
 * Next fire = previous scheduled fire + period, independent of how long the
 * run took. Fires missed while a run overran collapse into one.
 */
export interface FixedRatePolicy {
  kind: 'fixed-rate';
  initialDelay: number;
  period: number;
}

export type SchedulePolicy = FixedIntervalPolicy | FixedRatePolicy;

/** Timestamps of one run, all on the executor's clock */
export interface FireTimes {
  /** Instant the run was scheduled for */
  scheduledAt: Instant;
  startedAt: Instant;
  finishedAt: Instant;
  /** Instant the next fire is being computed at */
  now: Instant;
}

export function fixedInterval(period: Duration, initialDelay: Duration = 0): FixedIntervalPolicy {
  return {
    kind: 'fixed-interval',
    initialDelay: requireMillis('initialDelay', initialDelay, 0, false),
    period: requireMillis('period', period, 0, true),
  };
}

export function fixedRate(period: Duration, initialDelay: Duration = 0): FixedRatePolicy {
  return {
    kind: 'fixed-rate',
    initialDelay: requireMillis('initialDelay', initialDelay, 0, false),
    period: requireMillis('period', period, 0, true),
  };
}

/**
 * Check a policy built by hand (rather than through fixedInterval/fixedRate)
 */
export function validatePolicy(policy: SchedulePolicy): SchedulePolicy {
  if (policy.kind !== 'fixed-interval' && policy.kind !== 'fixed-rate') {
    throw new ConfigurationError(`Unknown schedule policy: ${JSON.stringify(policy)}`, 'kind', policy);
  }
  requireMillis('initialDelay', policy.initialDelay, 0, false);
  requireMillis('period', policy.period, 0, true);
  return policy;
}

/**
 * Instant of the first fire for a slot registered at `registeredAt`
 */
export function firstFire(policy: SchedulePolicy, registeredAt: Instant): Instant {
  return registeredAt + policy.initialDelay;
}

/**
 * Instant of the fire that follows the run described by `times`
 */
export function nextFire(policy: SchedulePolicy, times: FireTimes): Instant {
  switch (policy.kind) {
    case 'fixed-interval':
      return times.finishedAt + policy.period;

    case 'fixed-rate': {
      const next = times.scheduledAt + policy.period;
      if (next >= times.now) {
        return next;
      }
      // Overran: jump to the first grid point at or after now
      return next + missedFires(policy, times) * policy.period;
    }
  }
}

/**
 * Fixed-rate grid points skipped because the run described by `times`
 * overran them. Always 0 for fixed-interval.
 */
export function missedFires(policy: SchedulePolicy, times: FireTimes): number {
  if (policy.kind !== 'fixed-rate') {
    return 0;
  }
  const next = times.scheduledAt + policy.period;
  if (next >= times.now) {
    return 0;
  }
  return Math.ceil((times.now - next) / policy.period);
}

/**
 * Format policy for display
 */
export function formatPolicy(policy: SchedulePolicy): string {
  const label = policy.kind === 'fixed-rate' ? 'fixed rate' : 'fixed interval';
  const delay = policy.initialDelay > 0 ? ` after ${formatMillis(policy.initialDelay)}` : '';
  return `${label} every ${formatMillis(policy.period)}${delay}`;
}
