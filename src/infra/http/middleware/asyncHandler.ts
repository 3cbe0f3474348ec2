import type { NextFunction, Request, Response } from 'express';

/**
 * Adapt an async handler to Express: the returned handler is synchronous and
 * forwards a rejection to next() so the error handler renders it.
 */
export function asyncHandler<Req extends Request = Request>(
  fn: (req: Req, res: Response, next: NextFunction) => Promise<unknown>
): (req: Req, res: Response, next: NextFunction) => void {
  return (req, res, next) => {
    void fn(req, res, next).catch(next);
  };
}
