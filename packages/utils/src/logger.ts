/**
 * Structured Logging System
 * =========================
 * Centralized logging using Winston with structured output and
 * context propagation. Each package gets a namespaced logger.
 */

import * as winston from 'winston';

// Log levels
export enum LogLevel {
  ERROR = 'error',
  WARN = 'warn',
  INFO = 'info',
  DEBUG = 'debug',
  TRACE = 'trace',
}

// Log context interface
export interface LogContext {
  model?: string;
  filetype?: string;
  filename?: string;
  unit?: number;
  [key: string]: unknown;
}

// Logger configuration interface
interface LoggerConfig {
  level: string;
  enableConsole: boolean;
}

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  enableConsole: process.env.LOG_CONSOLE !== 'false',
};

// Custom format for structured logging
const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Console format for development (human-readable)
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

// A silenced console transport keeps winston from complaining about a logger without transports
const transports: winston.transport[] = [
  new winston.transports.Console({
    format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
    level: defaultConfig.level,
    silent: !defaultConfig.enableConsole,
  }),
];

// Create Winston logger instance
const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'gwmodel' },
  transports,
  exitOnError: false,
});

// Logger class with context support and package namespacing
class Logger {
  private context: LogContext = {};
  private namespace: string = 'gwmodel';

  /**
   * Create a logger with a specific namespace (package name)
   */
  constructor(namespace?: string) {
    if (namespace) {
      this.namespace = namespace;
    }
  }

  /**
   * Set context that will be included in all subsequent log messages
   */
  setContext(context: LogContext): void {
    this.context = { ...this.context, ...context };
  }

  clearContext(): void {
    this.context = {};
  }

  getContext(): LogContext {
    return { ...this.context };
  }

  getNamespace(): string {
    return this.namespace;
  }

  private mergeContext(additionalContext?: LogContext): LogContext {
    return {
      namespace: this.namespace,
      ...this.context,
      ...additionalContext,
    };
  }

  /**
   * Log error message
   */
  error(message: string, error?: unknown, context?: LogContext): void {
    const logContext = this.mergeContext(context);

    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...logContext,
        error: {
          message: error.message,
          stack: error.stack,
          name: error.name,
        },
      });
    } else if (error) {
      winstonLogger.error(message, { ...logContext, error });
    } else {
      winstonLogger.error(message, logContext);
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.mergeContext(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.mergeContext(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.mergeContext(context));
  }

  /**
   * Log trace message (most verbose)
   */
  trace(message: string, context?: LogContext): void {
    // Winston doesn't have trace level, use debug
    winstonLogger.debug(message, { ...this.mergeContext(context), level: 'trace' });
  }

  /**
   * Create a child logger with persistent context
   */
  child(context: LogContext): Logger {
    const childLogger = new Logger(this.namespace);
    childLogger.setContext({ ...this.context, ...context });
    return childLogger;
  }
}

// Factory function to create package-specific loggers
export function createLogger(packageName: string): Logger {
  return new Logger(packageName);
}

// Export singleton instance (default logger)
export const logger = new Logger('gwmodel');

export { Logger };

// Export winston logger for advanced usage
export { winstonLogger };
