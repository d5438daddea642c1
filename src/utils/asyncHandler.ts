import { Request, Response, NextFunction, RequestHandler } from 'express';

type AsyncRoute = (req: Request, res: Response, next: NextFunction) => Promise<void>;

/**
 * Forwards a rejected route promise to the error handler, so services can
 * throw AppError subclasses (AmbiguousMatchError, ConfigurationError, ...)
 * and the handler maps them to a status.
 */
export const asyncHandler =
  (route: AsyncRoute): RequestHandler =>
  (req, res, next) => {
    route(req, res, next).catch(next);
  };

export default asyncHandler;
