/**
 * Async Wrapper Middleware
 *
 * Wraps async route handlers to properly catch and forward errors.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRequestHandler = (
  req: Request,
  res: Response,
  next: NextFunction
) => Promise<void>;

/**
 * Wraps an async route handler to catch errors and forward them to Express error handler.
 *
 * @example
 * router.post('/:id/sync', asyncHandler(connectionsController.sync));
 */
export function asyncHandler(fn: AsyncRequestHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction) => {
    fn(req, res, next).catch(next);
  };
}
