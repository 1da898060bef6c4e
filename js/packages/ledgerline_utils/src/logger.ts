import { LogLevel, type ILogger, type LevelName, type LogContext, type LoggerConfig } from './types';

/**
 * ANSI color codes for terminal output
 */
const COLORS = {
  reset: '\x1b[0m',
  red: '\x1b[31m',
  yellow: '\x1b[33m',
  blue: '\x1b[34m',
  magenta: '\x1b[35m',
  gray: '\x1b[90m',
};

const LEVEL_COLORS: Record<LevelName, string> = {
  DEBUG: COLORS.gray,
  INFO: COLORS.blue,
  WARN: COLORS.yellow,
  ERROR: COLORS.red,
};

const LEVEL_NAMES: ReadonlyMap<string, LogLevel> = new Map([
  ['debug', LogLevel.DEBUG],
  ['info', LogLevel.INFO],
  ['warn', LogLevel.WARN],
  ['error', LogLevel.ERROR],
  ['silent', LogLevel.SILENT],
]);

/** Environment variable read by {@link configureLoggerFromEnv} */
export const LOG_LEVEL_ENV = 'LEDGERLINE_LOG_LEVEL';

type ConsoleMethod = 'debug' | 'info' | 'warn' | 'error';

/**
 * Global logger configuration
 */
class LoggerManager {
  private level: LogLevel = LogLevel.ERROR;
  private namespaces: Map<string, LogLevel> = new Map();
  private colors = true;
  private timestamps = true;
  private customFormatter: LoggerConfig['formatter'];

  setGlobalLogLevel(level: LogLevel): void {
    this.level = level;
  }

  /**
   * Supports wildcards: 'ledgerline:*' or 'ledgerline:api:*'
   */
  setNamespaceLogLevel(namespace: string, level: LogLevel): void {
    this.namespaces.set(namespace, level);
  }

  configure(config: Partial<LoggerConfig>): void {
    if (config.level !== undefined) this.level = config.level;
    if (config.colors !== undefined) this.colors = config.colors;
    if (config.timestamps !== undefined) this.timestamps = config.timestamps;
    if (config.formatter !== undefined) this.customFormatter = config.formatter;
    if (config.namespaces) {
      for (const [namespace, level] of Object.entries(config.namespaces)) {
        this.namespaces.set(namespace, level);
      }
    }
  }

  /**
   * Reset to silent (ERROR only), default formatting
   */
  reset(): void {
    this.level = LogLevel.ERROR;
    this.namespaces.clear();
    this.colors = true;
    this.timestamps = true;
    this.customFormatter = undefined;
  }

  /**
   * Most specific match wins: exact name, then each parent prefix, each checked
   * as itself and as `prefix:*`.
   */
  getEffectiveLevel(namespace: string): LogLevel {
    const exact = this.namespaces.get(namespace);
    if (exact !== undefined) return exact;

    const parts = namespace.split(':');
    for (let i = parts.length; i > 0; i--) {
      const pattern = parts.slice(0, i).join(':');

      const prefixLevel = this.namespaces.get(pattern);
      if (prefixLevel !== undefined) return prefixLevel;

      const wildcardLevel = this.namespaces.get(`${pattern}:*`);
      if (wildcardLevel !== undefined) return wildcardLevel;
    }

    return this.level;
  }

  format(level: LevelName, namespace: string, message: string, timestamp: Date): string {
    if (this.customFormatter) {
      return this.customFormatter(level, namespace, message, timestamp);
    }

    const time = this.timestamps ? timestamp.toISOString() : '';

    if (!this.colors) {
      return time
        ? `${time} [${level}] [${namespace}] ${message}`
        : `[${level}] [${namespace}] ${message}`;
    }

    const timeStr = time ? `${COLORS.gray}${time}${COLORS.reset} ` : '';
    return `${timeStr}${LEVEL_COLORS[level]}[${level}]${COLORS.reset} ${COLORS.magenta}[${namespace}]${COLORS.reset} ${message}`;
  }
}

const loggerManager = new LoggerManager();

function hasFields(context: LogContext | undefined): context is LogContext {
  return context !== undefined && Object.keys(context).length > 0;
}

class Logger implements ILogger {
  constructor(private readonly namespace: string) {}

  /**
   * Checked on every call so configuration changes take effect immediately
   */
  isLevelEnabled(level: LogLevel): boolean {
    return loggerManager.getEffectiveLevel(this.namespace) <= level;
  }

  debug(message: string, context?: LogContext): void {
    this.write(LogLevel.DEBUG, 'DEBUG', 'debug', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.write(LogLevel.INFO, 'INFO', 'info', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.write(LogLevel.WARN, 'WARN', 'warn', message, context);
  }

  error(message: string, error?: Error | LogContext, context?: LogContext): void {
    if (!this.isLevelEnabled(LogLevel.ERROR)) return;

    const cause = error instanceof Error ? error : undefined;
    const fields = error instanceof Error ? context : error;

    this.write(LogLevel.ERROR, 'ERROR', 'error', message, fields);

    // Stack goes on its own line
    if (cause?.stack) {
      // eslint-disable-next-line no-console
      console.error(cause.stack);
    }
  }

  child(subNamespace: string): ILogger {
    return new Logger(`${this.namespace}:${subNamespace}`);
  }

  private write(
    level: LogLevel,
    name: LevelName,
    method: ConsoleMethod,
    message: string,
    context?: LogContext
  ): void {
    if (!this.isLevelEnabled(level)) return;

    const line = loggerManager.format(name, this.namespace, message, new Date());
    if (hasFields(context)) {
      // eslint-disable-next-line no-console
      console[method](line, context);
    } else {
      // eslint-disable-next-line no-console
      console[method](line);
    }
  }
}

/**
 * Create a logger for a specific namespace
 *
 * @example
 * ```typescript
 * const logger = createLogger('ledgerline:api:client');
 * logger.debug('GET /blocks/latest');
 * ```
 */
export function createLogger(namespace: string): ILogger {
  return new Logger(namespace);
}

export function setGlobalLogLevel(level: LogLevel): void {
  loggerManager.setGlobalLogLevel(level);
}

/**
 * Set log level for a specific namespace or pattern
 *
 * @example
 * ```typescript
 * setNamespaceLogLevel('ledgerline:api:lister', LogLevel.DEBUG);
 * setNamespaceLogLevel('ledgerline:api:*', LogLevel.INFO);
 * ```
 */
export function setNamespaceLogLevel(namespace: string, level: LogLevel): void {
  loggerManager.setNamespaceLogLevel(namespace, level);
}

/**
 * Configure the logger system. Namespace levels are merged into the existing ones.
 */
export function configureLogger(config: Partial<LoggerConfig>): void {
  loggerManager.configure(config);
}

/**
 * Apply `LEDGERLINE_LOG_LEVEL` (debug, info, warn, error, silent).
 *
 * @returns the level applied, or undefined when the variable is unset or unknown
 */
export function configureLoggerFromEnv(
  env: Record<string, string | undefined> = process.env
): LogLevel | undefined {
  const raw = env[LOG_LEVEL_ENV]?.trim().toLowerCase();
  if (!raw) return undefined;

  const level = LEVEL_NAMES.get(raw);
  if (level === undefined) return undefined;

  loggerManager.setGlobalLogLevel(level);
  return level;
}

export function disableLogging(): void {
  loggerManager.setGlobalLogLevel(LogLevel.SILENT);
}

export function enableDebugLogging(): void {
  loggerManager.setGlobalLogLevel(LogLevel.DEBUG);
}

/**
 * Reset logger to default configuration (useful for testing)
 */
export function resetLogger(): void {
  loggerManager.reset();
}
