import { Request, Response, NextFunction, RequestHandler } from 'express';

type RouteHandler = (req: Request, res: Response, next: NextFunction) => unknown;

/**
 * Forwards anything a route handler throws or rejects with to the error handler.
 * Synchronous throws are caught too, since the matching routes do no I/O.
 */
export const asyncHandler =
  (fn: RouteHandler): RequestHandler =>
  (req, res, next) => {
    Promise.resolve()
      .then(() => fn(req, res, next))
      .catch(next);
  };

export default asyncHandler;
