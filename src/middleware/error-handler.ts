import type { Request, Response, NextFunction } from 'express';
import pino from 'pino';
import { AppError, toErrorObject } from '../utils/errors.js';

const log = pino({ name: 'http-error' });

export interface ErrorResponse {
  error: {
    code: string;
    message: string;
    details?: Record<string, unknown>;
  };
}

/**
 * Last middleware in the chain. AppErrors keep their status and code;
 * anything else is a 500 whose message is hidden in production.
 */
export function errorHandler(err: unknown, req: Request, res: Response<ErrorResponse>, _next: NextFunction): void {
  if (err instanceof AppError) {
    if (err.isOperational) {
      log.warn({ method: req.method, url: req.url, ...toErrorObject(err) }, err.message);
    } else {
      log.error({ method: req.method, url: req.url, ...toErrorObject(err) }, err.message);
    }
    res.status(err.statusCode).json({
      error: err.isOperational
        ? { code: err.code, message: err.message, details: err.context }
        : { code: err.code, message: 'Internal server error' },
    });
    return;
  }

  log.error({ method: req.method, url: req.url, err }, 'Unhandled error');
  res.status(500).json({
    error: {
      code: 'INTERNAL_ERROR',
      message:
        process.env.NODE_ENV === 'production' || !(err instanceof Error) ? 'Internal server error' : err.message,
    },
  });
}
