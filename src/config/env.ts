/**
 * Executor configuration from the environment, with dotenv support
 *
 * Variables (all optional):
 * - TASKLOOP_MODE            sequential | pooled
 * - TASKLOOP_POOL_SIZE       positive integer; implies pooled when MODE is unset
 * - TASKLOOP_EXECUTOR_NAME   executor name used in slot ids and logs
 * - TASKLOOP_LOG_LEVEL       debug | info | warn | error
 * - TASKLOOP_SHUTDOWN_DRAIN  true | false (also 1/0, yes/no)
 */

import { config as dotenvConfig } from 'dotenv';
import { resolve } from 'node:path';
import { existsSync } from 'node:fs';
import { ConfigurationError } from '../errors/index.js';
import { isLogLevel, type LogLevel } from '../observability/logger.js';
import { ENV_VARS, EXECUTOR_DEFAULTS, type ExecutorMode } from './constants.js';

export interface EnvFileOptions {
  /** Path to .env file (default: .env in cwd) */
  envFile?: string;
  /** Additional .env files to load (loaded in order, later files override) */
  envFiles?: string[];
  /** Base directory for resolving relative paths */
  baseDir?: string;
}

export interface LoadEnvResult {
  /** Whether any .env files were loaded */
  loaded: boolean;
  /** Paths of loaded .env files */
  files: string[];
  /** Number of variables loaded */
  count: number;
}

export interface ExecutorConfig {
  mode: ExecutorMode;
  name?: string;
  /** Required by the pooled mode */
  poolSize?: number;
  logLevel: LogLevel;
  drainOnShutdown: boolean;
}

export interface LoadExecutorConfigOptions extends EnvFileOptions {
  /** Values applied over whatever the environment provides */
  overrides?: Partial<ExecutorConfig>;
}

type Env = Record<string, string | undefined>;

/**
 * Load environment variables from .env files
 */
export function loadEnv(options: EnvFileOptions = {}): LoadEnvResult {
  const baseDir = options.baseDir || process.cwd();
  const files: string[] = [];
  let totalCount = 0;

  const envFilePaths: string[] = [];

  if (options.envFiles) {
    envFilePaths.push(...options.envFiles.map((f) => resolve(baseDir, f)));
  } else if (options.envFile) {
    envFilePaths.push(resolve(baseDir, options.envFile));
  } else {
    // Default: look for .env, .env.local in order
    for (const file of ['.env', '.env.local']) {
      envFilePaths.push(resolve(baseDir, file));
    }
  }

  // Later files override earlier ones
  for (const envPath of envFilePaths) {
    if (!existsSync(envPath)) continue;

    const result = dotenvConfig({ path: envPath, override: true });
    if (!result.error && result.parsed) {
      files.push(envPath);
      totalCount += Object.keys(result.parsed).length;
    }
  }

  return {
    loaded: files.length > 0,
    files,
    count: totalCount,
  };
}

/**
 * Build an executor configuration from environment variables
 */
export function resolveExecutorConfig(env: Env = process.env): ExecutorConfig {
  const poolSize = parsePoolSize(env[ENV_VARS.POOL_SIZE]);
  const mode = parseMode(env[ENV_VARS.MODE], poolSize);
  const name = env[ENV_VARS.EXECUTOR_NAME]?.trim();

  return {
    mode,
    name: name ? name : undefined,
    poolSize,
    logLevel: parseLogLevel(env[ENV_VARS.LOG_LEVEL]),
    drainOnShutdown: parseBoolean(
      ENV_VARS.SHUTDOWN_DRAIN,
      env[ENV_VARS.SHUTDOWN_DRAIN],
      EXECUTOR_DEFAULTS.DRAIN_ON_SHUTDOWN
    ),
  };
}

/**
 * Load .env files, then resolve the executor configuration from process.env
 */
export function loadExecutorConfig(options: LoadExecutorConfigOptions = {}): ExecutorConfig {
  const { overrides, ...envOptions } = options;
  loadEnv(envOptions);
  return { ...resolveExecutorConfig(process.env), ...overrides };
}

function parseMode(raw: string | undefined, poolSize: number | undefined): ExecutorMode {
  if (raw === undefined || raw.trim() === '') {
    return poolSize !== undefined ? 'pooled' : 'sequential';
  }

  const value = raw.trim().toLowerCase();
  if (value === 'sequential' || value === 'pooled') {
    return value;
  }

  throw new ConfigurationError(
    `${ENV_VARS.MODE} must be 'sequential' or 'pooled', got '${raw}'`,
    ENV_VARS.MODE,
    raw
  );
}

function parsePoolSize(raw: string | undefined): number | undefined {
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }

  const value = raw.trim();
  if (!/^\d+$/.test(value) || Number(value) === 0) {
    throw new ConfigurationError(
      `${ENV_VARS.POOL_SIZE} must be a positive integer, got '${raw}'`,
      ENV_VARS.POOL_SIZE,
      raw
    );
  }

  return Number(value);
}

function parseLogLevel(raw: string | undefined): LogLevel {
  if (raw === undefined || raw.trim() === '') {
    return EXECUTOR_DEFAULTS.LOG_LEVEL;
  }

  const value = raw.trim().toLowerCase();
  if (isLogLevel(value)) {
    return value;
  }

  throw new ConfigurationError(
    `${ENV_VARS.LOG_LEVEL} must be one of debug, info, warn, error; got '${raw}'`,
    ENV_VARS.LOG_LEVEL,
    raw
  );
}

function parseBoolean(field: string, raw: string | undefined, fallback: boolean): boolean {
  if (raw === undefined || raw.trim() === '') {
    return fallback;
  }

  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
    case 'yes':
      return true;
    case 'false':
    case '0':
    case 'no':
      return false;
    default:
      throw new ConfigurationError(`${field} must be a boolean, got '${raw}'`, field, raw);
  }
}
