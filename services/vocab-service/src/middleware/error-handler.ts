import { NextFunction, Request, Response } from 'express';
import { config } from '../config/environment';
import { AppError } from '../utils/errors';
import { logger } from '../utils/logger';

export function notFoundHandler(req: Request, res: Response): void {
  res.status(404).json({
    error: 'not_found',
    message: `Route ${req.originalUrl} not found`
  });
}

// Global error handler
export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction): void {
  if (err instanceof AppError) {
    logger.warn(`${req.method} ${req.originalUrl} failed: ${err.message}`, { code: err.code, ...err.details });
    res.status(err.status).json({
      error: err.code,
      message: err.message,
      ...err.details
    });
    return;
  }

  logger.error('Unhandled error', {
    method: req.method,
    url: req.originalUrl,
    stack: err instanceof Error ? err.stack : String(err)
  });
  res.status(500).json({
    error: 'internal_error',
    message: config.nodeEnv === 'production' ? undefined : (err instanceof Error ? err.message : String(err))
  });
}
