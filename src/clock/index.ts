export { monotonicClock, systemClock, delayUntil, type Clock, type Instant } from './clock.js';
