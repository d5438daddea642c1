import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { AppError, logger } from '../utils';
import { env } from '../config';
import { formatValidationError } from './validateRequest';

/**
 * Maps thrown errors to the JSON error envelope.
 *
 * AppError and its engine subclasses keep their status and details
 * (an AmbiguityReport, pattern conflicts, failing fields). A ZodError that
 * escaped a route is treated as a 400. Anything else is a 500 and is
 * logged with its stack.
 */
export const errorHandler = (
  err: Error,
  req: Request,
  res: Response,
  _next: NextFunction
): void => {
  const error = err instanceof ZodError ? formatValidationError(err) : err;
  const known = error instanceof AppError ? error : null;

  const statusCode = known?.statusCode ?? 500;
  const message = known?.message ?? 'Internal Server Error';

  if (known?.isOperational) {
    logger.warn(`${req.method} ${req.originalUrl} -> ${statusCode} ${known.name}: ${message}`);
  } else {
    logger.error(`Unhandled error on ${req.method} ${req.originalUrl}:`, error);
  }

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(known?.details !== undefined && { details: known.details }),
    ...(env.NODE_ENV === 'development' && { stack: error.stack }),
    timestamp: new Date().toISOString(),
  });
};

export default errorHandler;
