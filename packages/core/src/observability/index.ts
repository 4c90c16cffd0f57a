export {
  TidewatchLogger,
  createLogger,
  isDebugMode,
  jsonConsoleSink,
  noopLogger,
  scopedLogger,
  setDebugMode,
  textConsoleSink,
  type LogContext,
  type LogEntry,
  type LogLevel,
  type LogSink,
  type Logger,
  type TidewatchLoggerConfig,
} from './logger.js';
