import type { NextFunction, Request, Response } from 'express';

/**
 * Wrap a handler whose result is sent as JSON; rejections reach the error handler
 */
export function jsonRoute<T>(
  produce: (req: Request) => Promise<T>
): (req: Request, res: Response, next: NextFunction) => void {
  return (req: Request, res: Response, next: NextFunction): void => {
    produce(req)
      .then((body) => {
        res.json(body);
      })
      .catch(next);
  };
}
