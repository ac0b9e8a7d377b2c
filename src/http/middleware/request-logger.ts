import type { NextFunction, Request, Response } from 'express';
import type { Logger } from '../../logger/index.js';

/**
 * Log every request once its response has been sent
 */
export function createRequestLogger(logger: Logger): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    const startTime = Date.now();

    res.on('finish', () => {
      logger.debug('HTTP request', {
        method: req.method,
        path: req.path,
        status: res.statusCode,
        durationMs: Date.now() - startTime,
      });
    });

    next();
  };
}
