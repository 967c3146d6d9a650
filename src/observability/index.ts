/**
 * Observability Module - structured logging for executors
 */

export type {
  LogLevel,
  LogEntry,
  Span,
  LogOutput,
  StructuredLogger,
  CreateLoggerOptions,
} from './logger.js';

export {
  LOG_LEVEL_NAMES,
  ConsoleOutput,
  JsonLinesOutput,
  BufferOutput,
  createStructuredLogger,
  formatEntry,
  isLogLevel,
} from './logger.js';
