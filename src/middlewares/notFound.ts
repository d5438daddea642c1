import { Request, Response } from 'express';
import { sendError } from '../utils';

/**
 * 404 for any path no router claimed
 */
export const notFound = (req: Request, res: Response): void => {
  sendError(res, 'Route not found', 404, `${req.method} ${req.originalUrl} is not an endpoint of this API`);
};

export default notFound;
