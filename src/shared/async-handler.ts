import { Request, Response, NextFunction, RequestHandler } from 'express';

/**
 * Wraps an async route handler so a rejected promise reaches the Express
 * error middleware via next(error).
 *
 *   router.get('/:tournamentId', asyncHandler(controller.getTournament));
 */
export const asyncHandler = (
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
): RequestHandler =>
  (req, res, next) => {
    fn(req, res, next).catch(next);
  };
