/**
 * Structured Logger with Winston
 *
 * Features:
 * - Multiple log levels (error, warn, info, debug)
 * - Console output on stderr (stdout is reserved for ledger output)
 * - Optional file logging with daily rotation
 * - Structured JSON logs in files
 * - Context injection (service, client, txid, etc)
 */

import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import * as path from 'path';
import * as fs from 'fs';

export type LogLevel = 'error' | 'warn' | 'info' | 'debug';

export const LOG_LEVELS: readonly LogLevel[] = ['error', 'warn', 'info', 'debug'];

export interface LoggerConfig {
  /** Service name (cli, replay, ...) */
  service: string;
  /** Log level */
  level?: LogLevel;
  /** Enable console output */
  console?: boolean;
  /** Stream for console output (default: process stderr) */
  stream?: NodeJS.WritableStream;
  /** Enable file logging */
  file?: boolean;
  /** Log directory */
  logDir?: string;
}

export type LogContext = Record<string, unknown>;

/**
 * Logger class with structured logging
 */
export class Logger {
  private logger: winston.Logger;
  private service: string;

  constructor(config: LoggerConfig, instance?: winston.Logger) {
    this.service = config.service;
    this.logger = instance ?? Logger.createWinstonLogger(config);
  }

  private static createWinstonLogger(config: LoggerConfig): winston.Logger {
    const logFormat = winston.format.combine(
      winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss.SSS' }),
      winston.format.errors({ stack: true }),
      winston.format.metadata({ fillExcept: ['message', 'level', 'timestamp', 'service'] }),
      winston.format.json()
    );

    // Console format (pretty print for dev)
    const consoleFormat = winston.format.combine(
      winston.format.timestamp({ format: 'HH:mm:ss.SSS' }),
      winston.format.colorize(),
      winston.format.printf(({ timestamp, level, message, service, ...meta }) => {
        const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
        return `${String(timestamp)} [${String(service)}] ${level}: ${String(message)}${metaStr}`;
      })
    );

    const transports: winston.transport[] = [];

    if (config.console !== false && config.stream) {
      transports.push(new winston.transports.Stream({ stream: config.stream, format: consoleFormat }));
    } else if (config.console !== false) {
      transports.push(
        new winston.transports.Console({
          format: consoleFormat,
          stderrLevels: [...LOG_LEVELS],
        })
      );
    }

    if (config.file) {
      const logDir = config.logDir ?? path.join(process.cwd(), 'logs', config.service);
      fs.mkdirSync(logDir, { recursive: true });

      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '14d',
          format: logFormat,
        })
      );

      // Error logs (separate file)
      transports.push(
        new DailyRotateFile({
          filename: path.join(logDir, `${config.service}-error-%DATE%.log`),
          datePattern: 'YYYY-MM-DD',
          maxSize: '20m',
          maxFiles: '30d',
          level: 'error',
          format: logFormat,
        })
      );
    }

    // Winston warns when a logger has no transports at all
    if (transports.length === 0) {
      transports.push(new winston.transports.Console({ silent: true }));
    }

    return winston.createLogger({
      level: config.level ?? 'info',
      defaultMeta: { service: config.service },
      transports,
    });
  }

  error(message: string, context?: LogContext): void {
    this.log('error', message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log('warn', message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log('info', message, context);
  }

  debug(message: string, context?: LogContext): void {
    this.log('debug', message, context);
  }

  private log(level: LogLevel, message: string, context?: LogContext): void {
    this.logger.log(level, message, context);
  }

  /**
   * Create child logger with additional context
   */
  child(context: LogContext): Logger {
    return new Logger({ service: this.service }, this.logger.child(context));
  }

  /**
   * Close logger and wait until every transport has flushed
   */
  async close(): Promise<void> {
    const flushed = this.logger.transports.map(
      (transport) => new Promise<void>((resolve) => transport.once('finish', () => resolve()))
    );
    this.logger.end();
    await Promise.all(flushed);
  }
}

/**
 * Create a logger instance
 */
export function createLogger(config: LoggerConfig): Logger {
  return new Logger(config);
}
