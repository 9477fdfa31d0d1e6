export {
  log,
  logger,
  createLogger,
  silentLogger,
  setLogLevel,
  isLogLevel,
  serializeError,
} from './logger';
export type { Logger, LogLevel, LogEntry, LogFields } from './logger';
