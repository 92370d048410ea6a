import { Request, Response, NextFunction } from 'express';
import { logger } from './logging.js';
import { ApplicationError } from '../errors/ApplicationError.js';

interface ErrorResponse {
  error: {
    message: string;
    status: number;
    code?: string;
    stack?: string;
  };
}

/**
 * Unified error handler for ApplicationError
 * Client errors (4xx) log at warn, everything else at error.
 */
export const errorHandler = (
  error: Error | ApplicationError,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const isDevelopment = process.env.NODE_ENV === 'development';
  const request = {
    method: req.method,
    url: req.url,
    ip: req.ip,
    userAgent: req.get('User-Agent'),
  };

  let statusCode: number;
  let message: string;
  let errorCode: string | undefined;

  if (error instanceof ApplicationError) {
    statusCode = error.statusCode;
    message = error.isOperational ? error.message : 'Internal server error';
    errorCode = error.code;

    const level = statusCode < 500 ? 'warn' : 'error';
    logger.log(level, 'Request error', { error: error.toJSON(), request });
  } else {
    statusCode = 500;
    message = 'Internal server error';

    logger.error('Request error (generic)', {
      error: {
        name: error.name,
        message: error.message,
        stack: error.stack,
      },
      request,
    });
  }

  const errorResponse: ErrorResponse = {
    error: {
      message,
      status: statusCode,
      ...(errorCode && { code: errorCode }),
    },
  };

  if (isDevelopment && error.stack) {
    errorResponse.error.stack = error.stack;
  }

  res.status(statusCode).json(errorResponse);
};

export const notFoundHandler = (req: Request, res: Response): void => {
  res.status(404).json({
    error: {
      message: `Route ${req.method} ${req.url} not found`,
      status: 404,
    },
  });
};
