import { Request, Response, NextFunction } from 'express';
import morgan from 'morgan';
import winston from 'winston';
import DailyRotateFile from 'winston-daily-rotate-file';
import { LoggingConfig } from '../config/types.js';

// Create logger with default config first to avoid circular dependency
// Will be configured properly during initializeLogger()
export const logger = winston.createLogger({
  level: 'info',
  format: winston.format.combine(
    winston.format.timestamp(),
    winston.format.errors({ stack: true }),
    winston.format.json()
  ),
  transports: [
    // Default console transport for early initialization logs
    new winston.transports.Console({
      format: winston.format.combine(
        winston.format.colorize({ all: true }),
        winston.format.simple()
      ),
    }),
  ],
});

let isInitialized = false;

/**
 * Initialize logger with the loaded logging configuration
 * Must be called after ConfigManager is fully initialized
 */
export function initializeLogger(config: LoggingConfig): void {
  if (isInitialized) {
    return;
  }

  logger.level = config.level;

  // Clear default transports
  logger.clear();

  if (config.file.enabled) {
    // Error log with daily rotation
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/error-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        level: 'error',
        maxSize: `${config.file.maxSize}m`,
        maxFiles: `${config.file.maxFiles}d`, // Keep logs for N days
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-error.json`,
      })
    );

    // Application log with daily rotation
    logger.add(
      new DailyRotateFile({
        filename: `${config.file.path}/app-%DATE%.log`,
        datePattern: 'YYYY-MM-DD',
        maxSize: `${config.file.maxSize}m`,
        maxFiles: `${config.file.maxFiles}d`,
        zippedArchive: true,
        auditFile: `${config.file.path}/.audit-app.json`,
      })
    );
  }

  if (config.console.enabled) {
    logger.add(
      new winston.transports.Console({
        format: winston.format.combine(
          winston.format.colorize({ all: config.console.colorize }),
          winston.format.simple()
        ),
      })
    );
  }

  isInitialized = true;
  logger.info('Logger initialized with configuration');
}

// Morgan middleware for HTTP request logging
export const requestLoggingMiddleware = morgan('combined', {
  stream: {
    write: (message: string) => {
      logger.info(message.trim());
    },
  },
});

export const errorLoggingMiddleware = (
  error: Error,
  req: Request,
  _res: Response,
  next: NextFunction
): void => {
  logger.error({
    message: error.message,
    stack: error.stack,
    url: req.url,
    method: req.method,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  });

  next(error);
};
