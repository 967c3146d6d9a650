export {
  TimerBridge,
  nodeTimers,
  MAX_TIMER_DELAY,
  type TimerPrimitive,
  type TimerId,
} from './bridge.js';
