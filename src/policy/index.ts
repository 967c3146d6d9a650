export {
  fixedInterval,
  fixedRate,
  validatePolicy,
  firstFire,
  nextFire,
  missedFires,
  formatPolicy,
  type SchedulePolicy,
  type FixedIntervalPolicy,
  type FixedRatePolicy,
  type FireTimes,
} from './policy.js';
export {
  toMillis,
  requireMillis,
  formatMillis,
  type Duration,
  type DurationSpec,
  type DurationUnit,
} from './duration.js';
