/**
 * Errors raised by the matching engine and its persistence boundary.
 *
 * Only configuration mistakes and manual-link misuse are real failures.
 * "No candidate" and "duplicate skipped" are ordinary results and never
 * show up here.
 */

import { AppError } from '../utils/AppError';
import type { AmbiguityReport, InstanceKey } from './types';

export interface PatternConflict {
  pattern: string;
  seriesId: string;
  conflictingPattern: string;
  conflictingSeriesId: string;
}

/**
 * Import patterns overlap across series, a pattern is malformed, or a
 * tolerance value is out of range.
 */
export class ConfigurationError extends AppError {
  public readonly conflicts: PatternConflict[];

  constructor(message: string, conflicts: PatternConflict[] = []) {
    super(message, 400, true, conflicts.length > 0 ? { conflicts } : undefined);
    this.conflicts = conflicts;
  }
}

/**
 * Two or more candidates cleared the accept threshold within the ambiguity
 * epsilon. No match was written; a manual link resolves it.
 */
export class AmbiguousMatchError extends AppError {
  public readonly report: AmbiguityReport;

  constructor(report: AmbiguityReport) {
    super(
      `Transaction ${report.transactionId} matches ${report.candidates.length} recurring instances equally well`,
      409,
      true,
      report
    );
    this.report = report;
  }
}

/**
 * A manual link targets a transaction or instance that is already
 * Active-linked to something else.
 */
export class InvalidManualLinkError extends AppError {
  constructor(message: string) {
    super(message, 409);
  }
}

/**
 * The conditional write refused to create a second Active match for a
 * transaction or a recurring instance.
 */
export class MatchConflictError extends AppError {
  public readonly transactionId: string;
  public readonly instance: InstanceKey;

  constructor(transactionId: string, instance: InstanceKey, reason: 'transaction' | 'instance') {
    super(
      reason === 'transaction'
        ? `Transaction ${transactionId} already has an active match`
        : `Recurring instance ${instance.seriesId}@${instance.scheduledDate} already has an active match`,
      409
    );
    this.transactionId = transactionId;
    this.instance = instance;
  }
}
