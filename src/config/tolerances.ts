import { createTolerances, type MatchingTolerances } from '../matching';
import { env } from './index';

/**
 * Service-wide matching tolerances: engine defaults with MATCH_* overrides.
 * Services receive this object at construction; engine code never reads env.
 */
export const defaultTolerances: MatchingTolerances = createTolerances({
  editDistanceThreshold: env.MATCH_EDIT_DISTANCE_THRESHOLD,
  jaccardThreshold: env.MATCH_JACCARD_THRESHOLD,
  amountToleranceCeiling: env.MATCH_AMOUNT_TOLERANCE_CEILING,
  enforceAmountCeiling: env.MATCH_ENFORCE_AMOUNT_CEILING,
  dateWindowDays: env.MATCH_DATE_WINDOW_DAYS,
  duplicateWindowDays: env.MATCH_DUPLICATE_WINDOW_DAYS,
  acceptThreshold: env.MATCH_ACCEPT_THRESHOLD,
  rejectThreshold: env.MATCH_REJECT_THRESHOLD,
  ambiguityEpsilon: env.MATCH_AMBIGUITY_EPSILON,
});

export default defaultTolerances;
