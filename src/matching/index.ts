/**
 * Transaction Matching & Reconciliation Engine
 *
 * Pure, deterministic functions for:
 * - duplicate detection of imported rows against stored transactions
 * - reconciling transactions with projected recurring instances, based on
 *   description similarity, amount closeness and date proximity
 *
 * Usage:
 * ```typescript
 * import { createTolerances, decideReconciliation } from './matching';
 *
 * const decision = decideReconciliation({
 *   transaction,
 *   instances,
 *   activeMatches,
 *   patterns,
 *   tolerances: createTolerances(),
 * });
 * console.log(decision.kind); // 'matched' | 'unmatched' | 'ambiguous'
 * ```
 */

// Main functions
export { decideReconciliation, rankCandidates } from './reconcileTransaction';
export type { ReconciliationInput } from './reconcileTransaction';
export { detectDuplicate } from './duplicateDetection';

// Individual steps (for testing/debugging)
export { normalizeDescription, extractTokens } from './normalizeDescription';
export { levenshteinDistance, jaccardIndex, compareDescriptions } from './similarity';
export {
  addDays,
  calculateDateScore,
  dayOffset,
  daysBetween,
  isCalendarDate,
  monthRange,
} from './dateProximity';
export {
  calculateAmountScore,
  calculateAmountVariance,
  calculateDescriptionScore,
  createPatternCandidate,
  determineLevel,
  generateExplanation,
  scoreCandidate,
  toAbsoluteCents,
} from './confidenceCalculator';
export {
  compareByDate,
  getDuplicateCandidates,
  getReconciliationCandidates,
  instanceKey,
} from './candidates';
export { buildAmbiguityReport, resolveAmbiguity } from './ambiguity';
export {
  compilePattern,
  findOverlappingPatterns,
  isMalformedPattern,
  matchImportPatterns,
  matchesPattern,
  normalizePattern,
  patternsOverlap,
  validateImportPatterns,
} from './importPatterns';
export type { PatternHit } from './importPatterns';

// Configuration
export { createTolerances, tolerancesSchema } from './tolerances';
export type { MatchingTolerances, ToleranceOverrides } from './tolerances';
export { DEFAULT_TOLERANCES, SCORE_WEIGHTS, CONFIDENCE_LEVELS } from './constants';

// Errors
export {
  AmbiguousMatchError,
  ConfigurationError,
  InvalidManualLinkError,
  MatchConflictError,
} from './errors';
export type { PatternConflict } from './errors';

// Types
export type {
  AmbiguityReport,
  AmbiguityResolution,
  CalendarDate,
  CandidateSummary,
  ConfidenceBreakdown,
  ConfidenceLevel,
  DescriptionComparison,
  DuplicateVerdict,
  ImportPattern,
  InstanceKey,
  MatchSource,
  MatchStatus,
  NormalizedDescription,
  ParsedRow,
  ReconciliationDecision,
  ReconciliationMatch,
  RecurringInstance,
  ScoredCandidate,
  Transaction,
  TransactionKind,
} from './types';
