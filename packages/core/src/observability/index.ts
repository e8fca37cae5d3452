export {
  DocketLogger,
  createLogger,
  formatText,
  isDebugMode,
  setDebugMode,
  type DocketLoggerConfig,
  type LogEntry,
  type LogFormat,
  type LogLevel,
} from './logger.js';
