export {
  EXECUTOR_DEFAULTS,
  POOL_DEFAULTS,
  ENV_VARS,
  type ExecutorMode,
} from './constants.js';
export {
  loadEnv,
  loadExecutorConfig,
  resolveExecutorConfig,
  type EnvFileOptions,
  type LoadEnvResult,
  type ExecutorConfig,
  type LoadExecutorConfigOptions,
} from './env.js';
