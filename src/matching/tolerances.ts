/**
 * Matching tolerances.
 *
 * Every engine function takes a MatchingTolerances value instead of reading
 * process-wide settings, so tests and production can run the same engine
 * with different thresholds.
 */

import { z } from 'zod';
import { DEFAULT_TOLERANCES } from './constants';
import { ConfigurationError } from './errors';

const probability = z.number().min(0).max(1);
const days = z.number().int().min(0).max(31);

export const tolerancesSchema = z
  .object({
    editDistanceThreshold: z.number().int().min(0),
    jaccardThreshold: probability,
    amountToleranceCeiling: z.number().positive(),
    enforceAmountCeiling: z.boolean(),
    dateWindowDays: days,
    duplicateWindowDays: days,
    acceptThreshold: probability,
    rejectThreshold: probability,
    ambiguityEpsilon: z.number().min(0).max(0.5),
  })
  .refine((value) => value.rejectThreshold <= value.acceptThreshold, {
    message: 'rejectThreshold must not exceed acceptThreshold',
    path: ['rejectThreshold'],
  });

export type MatchingTolerances = Readonly<z.infer<typeof tolerancesSchema>>;

export type ToleranceOverrides = Partial<z.infer<typeof tolerancesSchema>>;

/**
 * Builds a tolerance object from the defaults plus overrides.
 * Undefined overrides fall back to the default.
 *
 * @throws ConfigurationError when a value is out of range
 */
export function createTolerances(
  overrides: ToleranceOverrides = {},
  base: MatchingTolerances = DEFAULT_TOLERANCES
): MatchingTolerances {
  const merged: Record<string, unknown> = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      merged[key] = value;
    }
  }

  const result = tolerancesSchema.safeParse(merged);
  if (!result.success) {
    const problems = result.error.errors
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join(', ');
    throw new ConfigurationError(`Invalid matching tolerances: ${problems}`);
  }

  return Object.freeze(result.data);
}

export default createTolerances;
