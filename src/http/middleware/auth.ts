/**
 * HTTP Basic authentication middleware.
 *
 * Rejections carry a WWW-Authenticate challenge so browsers show their
 * login prompt.
 */

import type { NextFunction, Request, Response } from 'express';
import { ErrorCode } from '../../errors/index.js';
import type { Logger } from '../../logger/index.js';
import { parseBasicAuth, type CredentialChecker } from '../credentials.js';

export function createBasicAuthMiddleware(
  checker: CredentialChecker,
  realm: string,
  logger?: Logger
): (req: Request, res: Response, next: NextFunction) => void {
  const challenge = `Basic realm="${realm.replace(/"/g, '')}"`;

  const reject = (res: Response): void => {
    res.setHeader('WWW-Authenticate', challenge);
    res.status(401).json({ error: 'Authentication required', code: ErrorCode.UNAUTHORIZED });
  };

  return (req: Request, res: Response, next: NextFunction): void => {
    const credentials = parseBasicAuth(req.headers.authorization);
    if (!credentials) {
      reject(res);
      return;
    }

    checker
      .verify(credentials.username, credentials.password)
      .then((valid) => {
        if (!valid) {
          logger?.info('Authentication failed', { username: credentials.username, path: req.path });
          reject(res);
          return;
        }
        next();
      })
      .catch(next);
  };
}
