export {
  createLogger,
  formatLogEntry,
  noopLogger,
  type LogEntry,
  type LogLevel,
  type Logger,
  type LoggerOptions,
  type LogSink,
} from './logger.js';
