export {
  createLogger,
  setGlobalLogLevel,
  setNamespaceLogLevel,
  configureLogger,
  configureLoggerFromEnv,
  disableLogging,
  enableDebugLogging,
  resetLogger,
  LOG_LEVEL_ENV,
} from './logger';

export type { ILogger, LevelName, LogContext, LoggerConfig } from './types';

export { LogLevel } from './types';

/**
 * Package version
 */
export const VERSION = '0.1.0';
