export {
  SequentialExecutor,
  PooledExecutor,
  BaseExecutor,
  createExecutor,
  CancellationHandle,
  type Executor,
  type ExecutorCallbacks,
  type ExecutorOptions,
  type ExecutorState,
  type PooledExecutorOptions,
  type RunEvent,
  type RunOutcome,
  type ScheduleOptions,
  type ShutdownOptions,
  type SlotInfo,
  type SlotState,
  type Task,
  type TaskContext,
  type TaskScheduler,
} from './executor/index.js';
export {
  fixedInterval,
  fixedRate,
  validatePolicy,
  firstFire,
  nextFire,
  missedFires,
  formatPolicy,
  toMillis,
  formatMillis,
  type SchedulePolicy,
  type FixedIntervalPolicy,
  type FixedRatePolicy,
  type FireTimes,
  type Duration,
  type DurationSpec,
  type DurationUnit,
} from './policy/index.js';
export { monotonicClock, systemClock, type Clock, type Instant } from './clock/index.js';
export {
  TimerBridge,
  nodeTimers,
  MAX_TIMER_DELAY,
  type TimerPrimitive,
  type TimerId,
} from './timer/index.js';
export { BoundedWorkerPool, type WorkerPool, type Job } from './pool/index.js';
export {
  SchedulerError,
  ConfigurationError,
  TaskFault,
  TimerUnavailableError,
  PoolClosedError,
  isSchedulerError,
  formatErrors,
  type ErrorCode,
} from './errors/index.js';
export {
  createStructuredLogger,
  ConsoleOutput,
  JsonLinesOutput,
  BufferOutput,
  type StructuredLogger,
  type LogLevel,
  type LogEntry,
  type LogOutput,
  type Span,
  type CreateLoggerOptions,
} from './observability/index.js';
export {
  loadEnv,
  loadExecutorConfig,
  resolveExecutorConfig,
  EXECUTOR_DEFAULTS,
  POOL_DEFAULTS,
  ENV_VARS,
  type ExecutorConfig,
  type ExecutorMode,
  type EnvFileOptions,
  type LoadEnvResult,
  type LoadExecutorConfigOptions,
} from './config/index.js';
