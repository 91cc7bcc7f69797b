import type { Request, Response, NextFunction } from 'express';
import { logger } from '../lib/logger.js';

/**
 * Logs method, path, status and response time of every request at debug
 * level, or warn for 5xx. Bodies and headers are never logged.
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  const start = Date.now();
  res.on('finish', () => {
    const fields = {
      method: req.method,
      path: req.path,
      status: res.statusCode,
      ms: Date.now() - start,
    };
    if (res.statusCode >= 500) logger.warn('request failed', fields);
    else logger.debug('request', fields);
  });
  next();
}
