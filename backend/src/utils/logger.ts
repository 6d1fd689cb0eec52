/**
 * Logger Utility
 *
 * Leveled console logger shared by every backend module.
 * Respects the LOG_LEVEL environment variable to control verbosity.
 */

export enum LogLevel {
  SILENT = 0,
  ERROR = 1,
  WARN = 2,
  INFO = 3,
  DEBUG = 4,
}

export function parseLogLevel(level: string): LogLevel {
  switch (level.toLowerCase().trim()) {
    case 'silent':
      return LogLevel.SILENT;
    case 'error':
      return LogLevel.ERROR;
    case 'warn':
    case 'warning':
      return LogLevel.WARN;
    case 'info':
      return LogLevel.INFO;
    case 'debug':
    case 'verbose':
      return LogLevel.DEBUG;
    default:
      console.warn(`Unknown LOG_LEVEL "${level}", defaulting to "info"`);
      return LogLevel.INFO;
  }
}

class Logger {
  private static instance: Logger;
  private currentLevel: LogLevel;

  private constructor() {
    this.currentLevel = parseLogLevel(process.env.LOG_LEVEL || 'info');
  }

  public static getInstance(): Logger {
    if (!Logger.instance) {
      Logger.instance = new Logger();
    }
    return Logger.instance;
  }

  public setLogLevel(level: LogLevel | string): void {
    this.currentLevel = typeof level === 'string' ? parseLogLevel(level) : level;
  }

  /**
   * Format log message with optional context
   */
  private formatMessage(level: string, message: string, context?: string): string {
    const contextStr = context ? `[${context}]` : '';
    return `${new Date().toISOString()} [${level}] ${contextStr} ${message}`;
  }

  public error(message: string, context?: string, error?: unknown): void {
    if (this.currentLevel >= LogLevel.ERROR) {
      if (error !== undefined) {
        console.error(this.formatMessage('ERROR', message, context), error);
      } else {
        console.error(this.formatMessage('ERROR', message, context));
      }
    }
  }

  public warn(message: string, context?: string, error?: unknown): void {
    if (this.currentLevel >= LogLevel.WARN) {
      if (error !== undefined) {
        console.warn(this.formatMessage('WARN', message, context), error);
      } else {
        console.warn(this.formatMessage('WARN', message, context));
      }
    }
  }

  public info(message: string, context?: string, ...args: unknown[]): void {
    if (this.currentLevel >= LogLevel.INFO) {
      console.log(this.formatMessage('INFO', message, context), ...args);
    }
  }

  public debug(message: string, context?: string, ...args: unknown[]): void {
    if (this.currentLevel >= LogLevel.DEBUG) {
      console.log(this.formatMessage('DEBUG', message, context), ...args);
    }
  }

  /**
   * Log a startup/important message (always visible except in silent mode)
   */
  public important(message: string, context?: string, ...args: unknown[]): void {
    if (this.currentLevel > LogLevel.SILENT) {
      console.log(this.formatMessage('INFO', message, context), ...args);
    }
  }
}

export const logger = Logger.getInstance();

export const log = {
  error: (message: string, context?: string, error?: unknown) => logger.error(message, context, error),
  warn: (message: string, context?: string, error?: unknown) => logger.warn(message, context, error),
  info: (message: string, context?: string, ...args: unknown[]) => logger.info(message, context, ...args),
  debug: (message: string, context?: string, ...args: unknown[]) => logger.debug(message, context, ...args),
  important: (message: string, context?: string, ...args: unknown[]) => logger.important(message, context, ...args),
};

export default logger;
