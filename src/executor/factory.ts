import type { ExecutorConfig } from '../config/env.js';
import { PooledExecutor } from './pooled.js';
import { SequentialExecutor } from './sequential.js';
import type { ExecutorOptions } from './types.js';

export type Executor = SequentialExecutor | PooledExecutor;

/**
 * Build the executor described by a resolved configuration. `options`
 * supplies what configuration cannot (clock, timer, logger, callbacks);
 * configured values win over it.
 */
export function createExecutor(config: ExecutorConfig, options: ExecutorOptions = {}): Executor {
  const shared: ExecutorOptions = {
    ...options,
    name: config.name ?? options.name,
    logLevel: config.logLevel,
    drainOnShutdown: config.drainOnShutdown,
  };

  if (config.mode === 'pooled') {
    return new PooledExecutor({ ...shared, poolSize: config.poolSize });
  }
  return new SequentialExecutor(shared);
}
