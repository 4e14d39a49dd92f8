import * as winston from 'winston';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LogContext {
  [key: string]: unknown;
}

/**
 * Minimal Winston-based logger
 * Supports console + optional file logging
 */
export class Logger {
  private winston: winston.Logger;

  constructor(service: string, logFile?: string, level: LogLevel = 'debug') {
    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.timestamp({ format: 'HH:mm:ss' }),
          winston.format.colorize(),
          winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
            const metaStr = Object.keys(meta).length ? ` ${JSON.stringify(meta, bigintReplacer)}` : '';
            return `${timestamp} [${service}] ${level}: ${message}${metaStr}`;
          })
        ),
      }),
    ];

    if (logFile) {
      const fileFormat = winston.format.combine(winston.format.timestamp(), winston.format.json());

      transports.push(
        new winston.transports.File({
          filename: logFile,
          format: fileFormat,
        }),
        new winston.transports.File({
          filename: logFile.replace('.log', '-error.log'),
          level: 'error',
          format: fileFormat,
        })
      );
    }

    this.winston = winston.createLogger({
      level,
      defaultMeta: { service },
      transports,
      exitOnError: false,
    });
  }

  error(message: string, context?: LogContext): void {
    this.winston.error(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.winston.warn(message, context);
  }

  info(message: string, context?: LogContext): void {
    this.winston.info(message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.winston.debug(message, context);
  }

  /**
   * Log error objects with stack traces
   */
  logError(error: Error, context?: LogContext): void {
    this.winston.error('Error occurred', {
      ...context,
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
    });
  }
}

/**
 * JSON.stringify replacer that renders bigint values as decimal strings
 */
export function bigintReplacer(_key: string, value: unknown): unknown {
  return typeof value === 'bigint' ? value.toString() : value;
}

/**
 * Create a new logger instance
 */
export function createLogger(service: string, logFile?: string, level?: LogLevel): Logger {
  return new Logger(service, logFile, level);
}

/**
 * Default logger instance
 */
export const logger = createLogger('pricemath');
