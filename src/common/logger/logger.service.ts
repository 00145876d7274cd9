// src/common/logger/logger.service.ts

import { Injectable, LoggerService as NestLoggerService } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import * as winston from 'winston';

import { join } from 'path';
import * as fs from 'fs';

/**
 * Structured key/value context attached to a log line.
 */
export type LogMeta = Record<string, unknown>;

@Injectable()
export class LoggerService implements NestLoggerService {
  private logger: winston.Logger;

  constructor(private configService: ConfigService) {
    const logLevel = this.configService.get<string>('LOG_LEVEL') || 'info';
    const logDir = this.configService.get<string>('LOG_DIR') || 'logs';
    const logToFiles =
      this.configService.get<string>('LOG_TO_FILES', 'true') !== 'false';

    const transports: winston.transport[] = [
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.simple(),
        ),
      }),
    ];

    if (logToFiles) {
      if (!fs.existsSync(logDir)) {
        fs.mkdirSync(logDir, { recursive: true });
      }

      transports.push(
        // Combined Transport: All log levels
        new winston.transports.File({
          filename: join(logDir, 'combined.log'),
          level: 'silly',
        }),
        // Errors Transport: error only
        new winston.transports.File({
          filename: join(logDir, 'errors.log'),
          level: 'error',
        }),
      );
    }

    this.logger = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(
        winston.format.timestamp(),
        winston.format.json(),
      ),
      transports,
      exitOnError: false,
    });
  }

  /**
   * Logs informational messages.
   *
   * @param message - The message to log.
   * @param context - Optional context for the log.
   * @param meta - Optional structured fields (pair, attempt, duration...).
   */
  log(message: string, context?: string, meta?: LogMeta): void {
    this.logger.info({ message, context, ...meta });
  }

  /**
   * Logs error messages.
   *
   * @param message - The error message to log.
   * @param trace - The stack trace or additional details.
   * @param context - Optional context for the log.
   */
  error(message: string, trace?: string, context?: string): void;

  /**
   * Logs Error objects.
   *
   * @param error - The Error object to log.
   * @param context - Optional context for the log.
   * @param meta - Optional structured fields.
   */
  error(error: Error, context?: string, meta?: LogMeta): void;

  error(arg1: string | Error, arg2?: string, arg3?: string | LogMeta): void {
    if (arg1 instanceof Error) {
      const context = arg2 || 'Application';
      const trace = arg1.stack || 'No stack trace available';
      const meta = typeof arg3 === 'object' ? arg3 : {};
      this.logger.error({
        message: arg1.message,
        trace,
        context,
        errorName: arg1.name,
        ...meta,
      });
    } else {
      const trace = arg2 || '';
      const context = typeof arg3 === 'string' ? arg3 : 'Application';
      this.logger.error({ message: arg1, trace, context });
    }
  }

  /**
   * Logs warning messages.
   */
  warn(message: string, context?: string, meta?: LogMeta): void {
    this.logger.warn({ message, context, ...meta });
  }

  debug(message: string, context?: string, meta?: LogMeta): void {
    this.logger.debug({ message, context, ...meta });
  }

  verbose(message: string, context?: string, meta?: LogMeta): void {
    this.logger.verbose({ message, context, ...meta });
  }
}
