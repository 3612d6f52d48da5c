/**
 * Logging Module Index
 */

export {
  ConsoleLogger,
  getConsoleLogger,
  resetConsoleLogger,
  type ConsoleLogEntry,
  type ConsoleLogLevel,
  type ConsoleLogCategory,
  type ConsoleLogSubscriber,
} from './console-logger';

export { JsonlLogSink, StderrLogSink, type JsonlLogSinkOptions } from './jsonl-log-sink';

export {
  atomicWriteFileSync,
  DEFAULT_MAX_RETRIES,
  type AtomicWriteOptions,
  type AtomicWriteResult,
} from './atomic-file-writer';
