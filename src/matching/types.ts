/**
 * Type Definitions for the Matching & Reconciliation Engine
 *
 * These types define the input/output contracts for duplicate detection
 * and recurring-instance reconciliation. Everything under src/matching is
 * pure: no repositories, no I/O, no clocks except where a timestamp is passed in.
 */

// ============================================
// SHARED PRIMITIVES
// ============================================

/**
 * Calendar date in ISO form (YYYY-MM-DD). Bank data is day-granular, so the
 * engine never deals with times or time zones.
 */
export type CalendarDate = string;

/**
 * Which side of the ledger a transaction sits on. A transfer leg is matched
 * on absolute amount like the other kinds.
 */
export type TransactionKind = 'income' | 'expense' | 'transfer';

// ============================================
// INPUT TYPES
// ============================================

/**
 * A row produced by the CSV parsing collaborator, before it becomes a Transaction.
 */
export interface ParsedRow {
  date: CalendarDate;
  description: string;
  /** Signed amount as it appeared on the statement */
  amount: number;
  kind: TransactionKind;
  accountId: string;
  /** ISO 4217 code; defaults to the account currency when omitted */
  currency?: string;
}

/**
 * A stored transaction. Created by import or manual entry; the user may later
 * edit the description or date, which can invalidate an Auto match.
 */
export interface Transaction {
  id: string;
  accountId: string;
  date: CalendarDate;
  description: string;
  amount: number;
  currency: string;
  kind: TransactionKind;
  origin: 'import' | 'manual';
  createdAt: Date;
}

/**
 * One projected occurrence of a recurring series on a scheduled date.
 * Produced by the recurrence-expansion collaborator and read-only here.
 */
export interface RecurringInstance {
  seriesId: string;
  scheduledDate: CalendarDate;
  expectedDescription: string;
  expectedAmount: number;
  /** When set, only transactions on this account are considered */
  accountId?: string;
  /** When set, only transactions in this currency are considered */
  currency?: string;
}

/**
 * A user-configured wildcard pattern attributing descriptions to one series.
 */
export interface ImportPattern {
  seriesId: string;
  pattern: string;
}

// ============================================
// RECONCILIATION MATCH
// ============================================

export type MatchSource = 'auto' | 'manual';

export type MatchStatus = 'active' | 'rejected';

/**
 * Links one transaction to one recurring instance (series + scheduled date).
 * At most one active match may exist per transaction and per instance.
 */
export interface ReconciliationMatch {
  id: string;
  transactionId: string;
  seriesId: string;
  scheduledDate: CalendarDate;
  source: MatchSource;
  status: MatchStatus;
  /** Present only for auto matches */
  confidence?: number;
  /** Expected minus actual (absolute amounts). Positive means paid less than expected */
  amountVariance: number;
  /** Transaction date minus scheduled date, in days */
  dateOffsetDays: number;
  createdAt: Date;
  resolvedAt?: Date;
}

/**
 * Identifies a recurring instance independent of its projected payload.
 */
export interface InstanceKey {
  seriesId: string;
  scheduledDate: CalendarDate;
}

// ============================================
// NORMALIZATION & SIMILARITY
// ============================================

export interface NormalizedDescription {
  /** Lowercase, trimmed, single-spaced description with bank noise removed */
  normalized: string;
  /** Significant tokens (alphanumeric runs of length >= 3) */
  tokens: ReadonlySet<string>;
}

export interface DescriptionComparison {
  editDistance: number;
  jaccard: number;
  closeByDistance: boolean;
  closeByJaccard: boolean;
  /** True when either measure passes its threshold */
  matches: boolean;
}

// ============================================
// SCORING
// ============================================

export type ConfidenceLevel = 'high' | 'medium' | 'low';

/**
 * Detailed breakdown of how a confidence score was calculated.
 */
export interface ConfidenceBreakdown {
  /** Description signal in [0,1] before weighting */
  descriptionScore: number;
  /** Amount signal in [0,1] before weighting */
  amountScore: number;
  /** Date signal in [0,1] before weighting */
  dateScore: number;
  editDistance: number;
  jaccard: number;
}

export interface ScoredCandidate {
  instance: RecurringInstance;
  confidence: number;
  level: ConfidenceLevel;
  breakdown: ConfidenceBreakdown;
  amountVariance: number;
  dateOffsetDays: number;
  /** 'pattern' when an import pattern attributed the transaction to this series */
  via: 'pattern' | 'score';
  explanation: string;
}

/**
 * A candidate summarised for the UI when a human decision is needed.
 */
export interface CandidateSummary {
  seriesId: string;
  scheduledDate: CalendarDate;
  confidence: number;
}

export interface AmbiguityReport {
  transactionId: string;
  candidates: CandidateSummary[];
}

// ============================================
// DECISIONS
// ============================================

export type AmbiguityResolution =
  | { kind: 'none' }
  | { kind: 'winner'; winner: ScoredCandidate }
  | { kind: 'ambiguous'; tied: ScoredCandidate[] };

/**
 * Outcome of running the automatic pipeline for one transaction.
 */
export type ReconciliationDecision =
  | { kind: 'matched'; candidate: ScoredCandidate }
  | { kind: 'unmatched'; suggestions: CandidateSummary[] }
  | { kind: 'ambiguous'; report: AmbiguityReport };

/**
 * Per-row outcome of import-time duplicate suppression.
 */
export type DuplicateVerdict =
  | { kind: 'unique' }
  | { kind: 'exact'; transactionId: string }
  | { kind: 'fuzzy'; transactionId: string };
