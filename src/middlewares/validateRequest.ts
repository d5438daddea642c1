import { z, ZodError } from 'zod';
import { isCalendarDate } from '../matching';
import { AppError } from '../utils';

/**
 * Formats zod issues the way every validation error in the API reads
 */
export const formatValidationError = (error: ZodError): AppError => {
  const errorMessages = error.errors.map((err) => ({
    field: err.path.join('.'),
    message: err.message,
  }));
  return AppError.badRequest(`Validation failed: ${JSON.stringify(errorMessages)}`, errorMessages);
};

/**
 * Validates a request body, query or params object against a zod schema
 * and returns the typed result.
 *
 * @throws AppError 400 with the failing fields
 */
export const validateRequest = <S extends z.ZodTypeAny>(schema: S, value: unknown): z.output<S> => {
  const result = schema.safeParse(value);
  if (!result.success) {
    throw formatValidationError(result.error);
  }
  return result.data;
};

// Common validation schemas
export const commonSchemas = {
  calendarDate: z.string().refine(isCalendarDate, 'Expected a calendar date (YYYY-MM-DD)'),
  id: z.string().min(1, 'ID is required'),
};

export default validateRequest;
