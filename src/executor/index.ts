export { BaseExecutor } from './base.js';
export { SequentialExecutor } from './sequential.js';
export { PooledExecutor } from './pooled.js';
export { createExecutor, type Executor } from './factory.js';
export { CancellationHandle, type CancellationFlag } from './handle.js';
export { TaskSlot, type TaskSlotInit } from './slot.js';
export { Mailbox } from './mailbox.js';
export type {
  ExecutorCallbacks,
  ExecutorOptions,
  ExecutorState,
  PooledExecutorOptions,
  RunEvent,
  RunOutcome,
  ScheduleOptions,
  ShutdownOptions,
  SlotInfo,
  SlotState,
  Task,
  TaskContext,
  TaskScheduler,
} from './types.js';
