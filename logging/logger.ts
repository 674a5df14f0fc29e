/**
 * Centralized Logger Service
 * Uses Winston with console, optional file and caller-supplied transports
 */

import winston from 'winston';
import Transport from 'winston-transport';

const { combine, timestamp, printf, colorize, errors } = winston.format;

// Custom format for console output
const consoleFormat = printf(({ level, message, timestamp, component, ...meta }) => {
  const metaStr = Object.keys(meta).length > 0 ? JSON.stringify(meta) : '';
  const componentStr = component ? `[${component}]` : '';
  return `${timestamp} ${level} ${componentStr} ${message} ${metaStr}`;
});

export type LogMeta = Record<string, unknown>;

export interface LoggerOptions {
  component: string;
  enableConsole?: boolean;
  enableFile?: boolean;
  logFilePath?: string;
  logLevel?: string;
  /** Extra transports, e.g. a MemoryTransport in tests */
  transports?: Transport[];
}

export class Logger {
  private logger: winston.Logger;
  private component: string;

  constructor(options: LoggerOptions) {
    this.component = options.component;

    const transports: Transport[] = [];

    // Console transport (always enabled unless explicitly disabled)
    if (options.enableConsole !== false) {
      transports.push(
        new winston.transports.Console({
          // Keep stdout clean for CLI output
          stderrLevels: ['error', 'warn', 'info', 'debug'],
          format: combine(
            colorize(),
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            consoleFormat
          ),
        })
      );
    }

    if (options.enableFile && options.logFilePath) {
      transports.push(
        new winston.transports.File({
          filename: options.logFilePath,
          format: combine(
            timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
            errors({ stack: true }),
            winston.format.json()
          ),
        })
      );
    }

    transports.push(...(options.transports ?? []));

    this.logger = winston.createLogger({
      level: options.logLevel || process.env.LOG_LEVEL || 'info',
      format: combine(
        timestamp(),
        errors({ stack: true }),
        winston.format.json()
      ),
      transports,
      exitOnError: false,
    });
  }

  debug(message: string, meta?: LogMeta): void {
    this.logger.debug(message, { component: this.component, ...meta });
  }

  info(message: string, meta?: LogMeta): void {
    this.logger.info(message, { component: this.component, ...meta });
  }

  warn(message: string, meta?: LogMeta): void {
    this.logger.warn(message, { component: this.component, ...meta });
  }

  error(message: string, error?: unknown, meta?: LogMeta): void {
    const errorMeta: LogMeta = { component: this.component, ...meta };

    if (error) {
      if (error instanceof Error) {
        errorMeta.stackTrace = error.stack;
        errorMeta.errorCode = error.name;
      } else if (typeof error === 'object') {
        errorMeta.errorDetails = error;
      }
    }

    this.logger.error(message, errorMeta);
  }

  // Convenience method for strategy-scoped logs
  logStrategy(
    level: 'info' | 'warn' | 'error',
    message: string,
    strategy: string,
    meta?: LogMeta
  ): void {
    this.logger[level](message, {
      component: this.component,
      strategy,
      ...meta,
    });
  }

  close(): void {
    this.logger.close();
  }
}

// Singleton factory for creating loggers
class LoggerFactory {
  private static defaults: Partial<LoggerOptions> = {};
  private static loggers: Map<string, Logger> = new Map();

  /**
   * Set options applied to loggers created afterwards
   */
  static configure(defaults: Partial<LoggerOptions>): void {
    this.defaults = { ...defaults };
  }

  static getLogger(component: string, options?: Partial<LoggerOptions>): Logger {
    let logger = this.loggers.get(component);
    if (!logger) {
      logger = new Logger({ ...this.defaults, ...options, component });
      this.loggers.set(component, logger);
    }
    return logger;
  }

  static closeAll(): void {
    this.loggers.forEach((logger) => logger.close());
    this.loggers.clear();
  }
}

export { LoggerFactory };
