/**
 * Express error handler
 *
 *   - ZodError        → 400 with validation details
 *   - HttpError       → its own status
 *   - HostwatchError  → status by error code family
 *   - body parser 4xx → its own status
 *   - anything else   → 500
 *
 * Stack traces are only sent outside production.
 */

import type { NextFunction, Request, Response } from 'express';
import { ZodError } from 'zod';
import { ErrorCode, HostwatchError, HttpError } from '../../errors/index.js';
import type { Logger } from '../../logger/index.js';

export function statusForError(error: HostwatchError): number {
  if (error instanceof HttpError) return error.status;

  switch (error.code) {
    case ErrorCode.VALIDATION_ERROR:
    case ErrorCode.BAD_REQUEST:
      return 400;
    case ErrorCode.UNAUTHORIZED:
      return 401;
    case ErrorCode.NOT_FOUND:
      return 404;
    case ErrorCode.CONTAINER_RUNTIME_ERROR:
      return 502;
    default:
      return 500;
  }
}

/**
 * Errors the JSON body parser raises carry an HTTP status of their own
 */
function clientErrorStatus(err: Error): number | null {
  const status: unknown = 'status' in err ? err.status : undefined;
  return typeof status === 'number' && status >= 400 && status < 500 ? status : null;
}

export function createErrorHandler(
  logger: Logger,
  isProduction: boolean
): (err: Error, req: Request, res: Response, next: NextFunction) => void {
  return (err: Error, req: Request, res: Response, _next: NextFunction): void => {
    const stack = isProduction ? {} : { stack: err.stack };

    if (err instanceof ZodError) {
      logger.debug('Request validation failed', { path: req.path, issues: err.issues });
      res.status(400).json({ error: 'Validation failed', code: ErrorCode.BAD_REQUEST, details: err.issues });
      return;
    }

    if (err instanceof HostwatchError) {
      const status = statusForError(err);
      if (status >= 500) {
        logger.error(`Request error: ${err.message}`, err, { path: req.path });
      } else {
        logger.debug(`Request rejected: ${err.message}`, { path: req.path, code: err.code });
      }
      res.status(status).json({ error: err.message, code: err.code, ...stack });
      return;
    }

    const clientStatus = clientErrorStatus(err);
    if (clientStatus !== null) {
      logger.debug(`Request rejected: ${err.message}`, { path: req.path });
      res.status(clientStatus).json({ error: err.message, code: ErrorCode.BAD_REQUEST });
      return;
    }

    logger.error(`Request error: ${err.message}`, err, { path: req.path });
    res.status(500).json({ error: 'Internal server error', ...stack });
  };
}
