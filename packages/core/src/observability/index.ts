export {
  WatchLogger,
  createLogger,
  isDebugMode,
  setDebugMode,
  type LogEntry,
  type LogLevel,
  type WatchLoggerConfig,
} from './logger.js';
