/**
 * Log levels in ascending order of severity
 */
export enum LogLevel {
  /** Request-level tracing */
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  /** No logging */
  SILENT = 4,
}

/**
 * Extra fields printed after the message
 */
export type LogContext = Record<string, unknown> | object;

export type LevelName = 'DEBUG' | 'INFO' | 'WARN' | 'ERROR';

/**
 * Configuration for the logger
 */
export interface LoggerConfig {
  /** Global log level (default: ERROR) */
  level?: LogLevel;
  /** Per-namespace overrides, `prefix:*` wildcards allowed */
  namespaces?: Record<string, LogLevel>;
  /** ANSI colors (default: true) */
  colors?: boolean;
  /** ISO timestamps (default: true) */
  timestamps?: boolean;
  /** Custom format function */
  formatter?: (level: LevelName, namespace: string, message: string, timestamp: Date) => string;
}

/**
 * Logger interface
 */
export interface ILogger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error | LogContext, context?: LogContext): void;
  /** Create a child logger, `parent:sub` */
  child(subNamespace: string): ILogger;
  isLevelEnabled(level: LogLevel): boolean;
}
