/**
 * Constants for the Matching & Reconciliation Engine
 *
 * Tolerance defaults live here; callers never read them directly from
 * process-wide state. They are folded into a MatchingTolerances value
 * (see tolerances.ts) that is passed into every engine call.
 */

import stateCodes from './data/us-state-codes.json';

// ============================================
// SCORING WEIGHTS
// ============================================

/**
 * Weights of the three signals in the confidence score. They sum to 1.
 *
 * - 1.0 description + 1.0 amount + 1.0 date = 1.00
 * - 1.0 description + 0.0 amount + 1.0 date = 0.70 (amount differs, description wins)
 * - 0.0 description + 1.0 amount + 1.0 date = 0.50 (never auto-matched)
 */
export const SCORE_WEIGHTS = {
  DESCRIPTION: 0.5,
  AMOUNT: 0.3,
  DATE: 0.2,
} as const;

/**
 * Labels attached to scored candidates for display.
 */
export const CONFIDENCE_LEVELS = {
  HIGH: 0.85,
  MEDIUM: 0.6,
} as const;

/**
 * Confidence given to a candidate attributed by a user-configured import pattern.
 */
export const PATTERN_MATCH_CONFIDENCE = 1.0;

// ============================================
// TOLERANCE DEFAULTS
// ============================================

export const DEFAULT_TOLERANCES = {
  /** Levenshtein distance at or below which two descriptions are close */
  editDistanceThreshold: 5,
  /** Jaccard index at or above which two token sets are close */
  jaccardThreshold: 0.6,
  /**
   * Relative amount difference at which the amount signal reaches 0.
   * 1.0 means the amount may differ arbitrarily once the description matches.
   */
  amountToleranceCeiling: 1.0,
  /** When true, candidates beyond the ceiling are excluded instead of scored 0 */
  enforceAmountCeiling: false,
  /** Reconciliation window around the scheduled date, in days */
  dateWindowDays: 3,
  /** Duplicate-detection window around the row date, in days */
  duplicateWindowDays: 1,
  acceptThreshold: 0.8,
  rejectThreshold: 0.4,
  ambiguityEpsilon: 0.02,
} as const;

// ============================================
// NOISE VOCABULARY
// ============================================

/**
 * Boilerplate words and phrases banks add to card and transfer descriptions.
 * Phrases are matched as consecutive whole tokens.
 *
 * Examples of how these appear:
 * - "GROCERY STORE #659 11/07 MOBILE PURCHASE ANYTOWN TX" → remove "MOBILE", "PURCHASE"
 * - "DEBIT CARD PURCHASE COFFEE HOUSE" → remove "DEBIT CARD", "PURCHASE"
 * - "WEB PAYMENT CITY WATER" → remove "WEB PAYMENT"
 */
export const BOILERPLATE_PHRASES: ReadonlyArray<readonly string[]> = [
  ['debit', 'card'],
  ['web', 'payment'],
  ['purchase'],
  ['mobile'],
  ['ach'],
  ['pos'],
  ['online'],
  ['checkcard'],
  ['recurring'],
];

/**
 * Two-letter US state and territory codes, removed when they trail a description.
 */
export const US_STATE_CODES: ReadonlySet<string> = new Set(
  stateCodes.map((code) => code.toLowerCase())
);

/**
 * Longest run of plain words treated as a city name in front of a trailing state code.
 */
export const MAX_CITY_TOKENS = 3;

/**
 * Minimum length of a significant token.
 */
export const MIN_TOKEN_LENGTH = 3;

/**
 * Minimum length of a letter+digit run treated as a reference code.
 */
export const MIN_REFERENCE_CODE_LENGTH = 6;
