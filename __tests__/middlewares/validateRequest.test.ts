import { z } from 'zod';
import { commonSchemas, validateRequest } from '../../src/middlewares/validateRequest';
import { AppError } from '../../src/utils';

describe('validateRequest', () => {
  const schema = z.object({ date: commonSchemas.calendarDate });

  it('should return the parsed value', () => {
    expect(validateRequest(schema, { date: '2024-02-29' })).toEqual({ date: '2024-02-29' });
  });

  it.each(['2025-02-30', '2025-13-01', '2025-3-1', 'yesterday'])(
    'should reject %s as a calendar date',
    (date) => {
      expect(() => validateRequest(schema, { date })).toThrow(AppError);
      try {
        validateRequest(schema, { date });
      } catch (error) {
        expect(error).toMatchObject({
          statusCode: 400,
          details: [{ field: 'date', message: 'Expected a calendar date (YYYY-MM-DD)' }],
        });
      }
    }
  );
});
