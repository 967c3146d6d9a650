/**
 * Centralized Configuration Constants
 *
 * Default values used by the executors and the worker pool. Everything here
 * can be overridden through executor options or `TASKLOOP_*` environment
 * variables (see ./env.ts).
 */

// ============================================
// Executor Configuration
// ============================================

/**
 * Default executor configuration
 */
export const EXECUTOR_DEFAULTS = {
  /** Name of a sequential executor; prefixes slot ids and log context */
  NAME: 'core_executor',
  /** Minimum log level for executor loggers */
  LOG_LEVEL: 'warn' as const,
  /** Whether shutdown waits for in-flight tasks */
  DRAIN_ON_SHUTDOWN: true,
} as const;

// ============================================
// Worker Pool Configuration
// ============================================

/**
 * Default pooled executor configuration
 */
export const POOL_DEFAULTS = {
  /** Number of tasks that may run at the same time */
  SIZE: 4,
  /** Name prefix for a pooled executor and its pool */
  PREFIX: 'pool_thread_',
} as const;

// ============================================
// Environment Variables
// ============================================

/**
 * Environment variables read by loadExecutorConfig
 */
export const ENV_VARS = {
  MODE: 'TASKLOOP_MODE',
  POOL_SIZE: 'TASKLOOP_POOL_SIZE',
  EXECUTOR_NAME: 'TASKLOOP_EXECUTOR_NAME',
  LOG_LEVEL: 'TASKLOOP_LOG_LEVEL',
  SHUTDOWN_DRAIN: 'TASKLOOP_SHUTDOWN_DRAIN',
} as const;

// ============================================
// Type Definitions for Configuration
// ============================================

/** Execution context an executor dispatches tasks to */
export type ExecutorMode = 'sequential' | 'pooled';
