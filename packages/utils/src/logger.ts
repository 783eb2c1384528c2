/**
 * Structured Logging System
 * =========================
 * Winston with a human-readable console in development, JSON in production
 * and daily-rotated error/combined files unless LOG_FILE=false.
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export interface LogContext {
  strategy?: string;
  cycleId?: string;
  windowDays?: number;
  [key: string]: unknown;
}

interface LoggerConfig {
  level: string;
  enableConsole: boolean;
  enableFile: boolean;
  logDir: string;
  maxFiles: string;
  maxSize: string;
}

const defaultConfig: LoggerConfig = {
  level: process.env.LOG_LEVEL || (process.env.NODE_ENV === 'production' ? 'info' : 'debug'),
  enableConsole: process.env.LOG_CONSOLE !== 'false',
  enableFile: process.env.LOG_FILE !== 'false' && process.env.NODE_ENV !== 'test',
  logDir: process.env.LOG_DIR || path.join(process.cwd(), 'logs'),
  maxFiles: process.env.LOG_MAX_FILES || '14d',
  maxSize: process.env.LOG_MAX_SIZE || '20m',
};

const structuredFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

// Human-readable console output for development
const consoleFormat = winston.format.combine(
  winston.format.colorize(),
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
  winston.format.printf(({ timestamp, level, message, ...meta }) => {
    const metaStr = Object.keys(meta).length ? JSON.stringify(meta, null, 2) : '';
    return `[${String(timestamp)}] ${level}: ${String(message)}${metaStr ? '\n' + metaStr : ''}`;
  })
);

const transports: winston.transport[] = [];

if (defaultConfig.enableConsole) {
  transports.push(
    new winston.transports.Console({
      format: process.env.NODE_ENV === 'production' ? structuredFormat : consoleFormat,
      level: defaultConfig.level,
    })
  );
}

if (defaultConfig.enableFile) {
  if (!fs.existsSync(defaultConfig.logDir)) {
    fs.mkdirSync(defaultConfig.logDir, { recursive: true });
  }

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'error-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      level: 'error',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );

  transports.push(
    new DailyRotateFile({
      filename: path.join(defaultConfig.logDir, 'combined-%DATE%.log'),
      datePattern: 'YYYY-MM-DD',
      format: structuredFormat,
      maxSize: defaultConfig.maxSize,
      maxFiles: defaultConfig.maxFiles,
      zippedArchive: true,
    })
  );
}

const winstonLogger = winston.createLogger({
  level: defaultConfig.level,
  format: structuredFormat,
  defaultMeta: { service: 'stratlab' },
  transports,
  // winston warns on every write when it has no transports
  silent: transports.length === 0,
  exitOnError: false,
});

/**
 * Winston front end that stamps every entry with the emitting package
 */
class Logger {
  constructor(readonly namespace: string = 'stratlab') {}

  private meta(context?: LogContext): LogContext {
    return { namespace: this.namespace, ...context };
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    if (error instanceof Error) {
      winstonLogger.error(message, {
        ...this.meta(context),
        error: { message: error.message, stack: error.stack, name: error.name },
      });
    } else if (error !== undefined) {
      winstonLogger.error(message, { ...this.meta(context), error });
    } else {
      winstonLogger.error(message, this.meta(context));
    }
  }

  warn(message: string, context?: LogContext): void {
    winstonLogger.warn(message, this.meta(context));
  }

  info(message: string, context?: LogContext): void {
    winstonLogger.info(message, this.meta(context));
  }

  debug(message: string, context?: LogContext): void {
    winstonLogger.debug(message, this.meta(context));
  }
}

export const logger = new Logger();

export { Logger, winstonLogger };
