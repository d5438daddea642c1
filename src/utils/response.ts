import { Response } from 'express';
import { ApiResponse } from '../types';

const envelope = <T>(body: Omit<ApiResponse<T>, 'timestamp'>): ApiResponse<T> => ({
  ...body,
  timestamp: new Date().toISOString(),
});

/**
 * `{ success: true, data, message }`; 201 for created transactions and
 * imports, 202 for queued sweeps and cancellations
 */
export const sendSuccess = <T>(res: Response, data: T, message?: string, statusCode = 200): Response =>
  res.status(statusCode).json(envelope({ success: true, data, message }));

/**
 * `{ success: false, error, message, details }`
 */
export const sendError = (
  res: Response,
  error: string,
  statusCode = 500,
  message?: string,
  details?: unknown
): Response => res.status(statusCode).json(envelope({ success: false, error, message, details }));
