import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logger';

export class AppError extends Error {
  statusCode: number;
  details?: Record<string, unknown>;

  constructor(message: string, statusCode: number = 500, details?: Record<string, unknown>) {
    super(message);
    this.name = this.constructor.name;
    this.statusCode = statusCode;
    this.details = details;
    Error.captureStackTrace(this, this.constructor);
  }
}

export const errorHandler = (
  err: unknown,
  req: Request,
  res: Response,
  // Express only treats four-argument middleware as an error handler
  _next: NextFunction
) => {
  const error = err instanceof Error ? err : new Error(String(err));
  const statusCode = error instanceof AppError ? error.statusCode : 500;
  const details = error instanceof AppError ? error.details : undefined;

  if (statusCode >= 500) {
    logger.error(`${req.method} ${req.originalUrl} failed:`, error);
  } else {
    logger.warn(`${req.method} ${req.originalUrl} rejected: ${error.message}`);
  }

  res.status(statusCode).json({
    error: {
      message: error.message || 'Internal Server Error',
      ...(details && { details }),
      ...(process.env.NODE_ENV === 'development' && { stack: error.stack }),
    },
  });
};
