import winston from 'winston';
import path from 'path';
import fs from 'fs';
import { ILogger, LogContext } from '../core/interfaces/ILogger';
import { ErrorHandler, ErrorCategory, ErrorSeverity } from './ErrorHandler';

export type LoggerEnvironment = 'development' | 'production' | 'test';

export class Logger implements ILogger {
  private winston: winston.Logger;
  private errorHandler: ErrorHandler;

  constructor(logLevel: string = 'info', logFile?: string, parent?: winston.Logger) {
    this.winston = parent ?? Logger.createWinston(logLevel, logFile);
    this.errorHandler = new ErrorHandler(this);
  }

  private static createWinston(logLevel: string, logFile?: string): winston.Logger {
    const formats = [
      winston.format.timestamp(),
      winston.format.errors({ stack: true }),
      winston.format.json()
    ];

    const transports: winston.transport[] = [
      new winston.transports.Console({
        level: logLevel,
        format: winston.format.combine(
          winston.format.colorize(),
          winston.format.timestamp(),
          winston.format.printf(({ timestamp, level, message, ...meta }) => {
            const metaStr = Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : '';
            return `${timestamp} [${level}]: ${message}${metaStr}`;
          })
        )
      })
    ];

    if (logFile) {
      const logsDir = path.dirname(logFile);
      if (!fs.existsSync(logsDir)) {
        fs.mkdirSync(logsDir, { recursive: true });
      }

      transports.push(
        new winston.transports.File({
          filename: logFile,
          level: logLevel,
          format: winston.format.combine(...formats),
          maxsize: 5242880, // 5MB
          maxFiles: 5,
          tailable: true
        })
      );

      transports.push(
        new winston.transports.File({
          filename: path.join(logsDir, 'error.log'),
          level: 'error',
          format: winston.format.combine(...formats),
          maxsize: 5242880,
          maxFiles: 3
        })
      );
    }

    const logger = winston.createLogger({
      level: logLevel,
      format: winston.format.combine(...formats),
      transports,
      exitOnError: false
    });

    if (logFile) {
      logger.exceptions.handle(
        new winston.transports.File({
          filename: path.join(path.dirname(logFile), 'exceptions.log'),
          maxsize: 5242880,
          maxFiles: 2
        })
      );
    }

    return logger;
  }

  getErrorHandler(): ErrorHandler {
    return this.errorHandler;
  }

  info(message: string, context?: LogContext): void {
    this.winston.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.winston.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    this.winston.error(message, context);

    if (error) {
      this.errorHandler.handleError(error, ErrorCategory.UNKNOWN, ErrorSeverity.HIGH, {
        operation: 'logging',
        component: 'logger',
        metadata: context
      });
    }
  }

  debug(message: string, context?: LogContext): void {
    this.winston.debug(message, context);
  }

  child(context: LogContext): Logger {
    return new Logger(this.getLevel(), undefined, this.winston.child(context));
  }

  getLevel(): string {
    return this.winston.level;
  }

  close(): Promise<void> {
    return new Promise((resolve) => {
      this.winston.on('finish', () => resolve());
      this.winston.end();
    });
  }

  static create(env: LoggerEnvironment = 'production', logFile?: string): Logger {
    const config: Record<LoggerEnvironment, { level: string; file?: string | undefined }> = {
      development: {
        level: 'debug',
        file: logFile ?? './logs/wardline-dev.log'
      },
      production: {
        level: 'info',
        file: logFile ?? './logs/wardline.log'
      },
      test: {
        level: 'error',
        file: undefined
      }
    };

    const settings = config[env];
    return new Logger(settings.level, settings.file);
  }

  static resolveEnvironment(value: string | undefined): LoggerEnvironment {
    return value === 'development' || value === 'test' ? value : 'production';
  }
}
