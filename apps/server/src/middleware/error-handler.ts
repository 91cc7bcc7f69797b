import type { Request, Response, NextFunction } from 'express';
import { logger, logError } from '../lib/logger.js';

/**
 * Last-resort handler for errors routes pass to `next()`. The message is
 * returned to the client outside production only.
 */
export function errorHandler(err: Error, req: Request, res: Response, _next: NextFunction): void {
  logger.error(`unhandled error on ${req.method} ${req.path}`, logError(err));
  const isDev = process.env.NODE_ENV !== 'production';
  res.status(500).json({
    error: isDev ? err.message || 'Internal Server Error' : 'Internal Server Error',
    code: 'INTERNAL_ERROR',
  });
}
