/**
 * Reconciliation Service
 *
 * Orchestrates the matching engine against storage:
 * - evaluating one transaction (the automatic decider)
 * - sweeping a date range of transactions
 * - the monthly matched/missing status of projected instances
 * - match lookups by transaction or by instance
 *
 * CRITICAL BUSINESS RULES:
 * - A Manual match is never touched by automatic evaluation
 * - An Auto match that no longer wins is rejected (superseded), never left stale
 * - Ambiguity writes no match; it is reported as AmbiguousMatchError
 * - The repository's conditional write is the only serialization point
 */

import {
  addDays,
  AmbiguousMatchError,
  decideReconciliation,
  instanceKey,
  MatchConflictError,
  monthRange,
} from '../matching';
import type {
  CalendarDate,
  CandidateSummary,
  InstanceKey,
  MatchingTolerances,
  ReconciliationMatch,
  ScoredCandidate,
} from '../matching';
import type { Repositories } from '../repositories';
import { AppError, logger } from '../utils';

// ============================================
// Types
// ============================================

export type EvaluationResult =
  | { kind: 'manual'; match: ReconciliationMatch }
  | {
      kind: 'matched';
      match: ReconciliationMatch;
      /** Present when the decision changed since the last evaluation */
      candidate?: ScoredCandidate;
      superseded?: ReconciliationMatch;
    }
  | { kind: 'unmatched'; suggestions: CandidateSummary[]; superseded?: ReconciliationMatch };

export interface SweepReport {
  from: CalendarDate;
  to: CalendarDate;
  evaluated: number;
  skipped: number;
  matched: number;
  unmatched: number;
  ambiguous: number;
  errored: number;
}

export interface InstanceStatus {
  seriesId: string;
  scheduledDate: CalendarDate;
  expectedDescription: string;
  expectedAmount: number;
  status: 'matched' | 'missing';
  match?: {
    id: string;
    transactionId: string;
    source: ReconciliationMatch['source'];
    confidence?: number;
    amountVariance: number;
    dateOffsetDays: number;
  };
}

export interface MonthlyStatusReport {
  year: number;
  month: number;
  matched: number;
  missing: number;
  instances: InstanceStatus[];
}

// ============================================
// Service
// ============================================

export class ReconciliationService {
  constructor(
    private readonly repositories: Repositories,
    private readonly tolerances: MatchingTolerances
  ) {}

  /**
   * Runs the automatic decider for one transaction.
   *
   * @throws AppError 404 when the transaction does not exist
   * @throws AmbiguousMatchError when candidates tie
   * @throws ConfigurationError when import patterns of several series match
   */
  async evaluate(
    transactionId: string,
    tolerances: MatchingTolerances = this.tolerances
  ): Promise<EvaluationResult> {
    const { transactions, instances, matches, patterns } = this.repositories;

    const transaction = await transactions.findById(transactionId);
    if (!transaction) {
      throw AppError.notFound(`Transaction ${transactionId} not found`);
    }

    const existing = await matches.findActiveByTransaction(transactionId);
    if (existing && existing.source === 'manual') {
      logger.debug(`[${transactionId}] Manual match ${existing.id} in place, skipping evaluation`);
      return { kind: 'manual', match: existing };
    }

    const from = addDays(transaction.date, -tolerances.dateWindowDays);
    const to = addDays(transaction.date, tolerances.dateWindowDays);
    const [nearbyInstances, activeMatches, allPatterns] = await Promise.all([
      instances.findBetween(from, to),
      matches.findActiveBetween(from, to),
      patterns.findAll(),
    ]);

    const decision = decideReconciliation({
      transaction,
      instances: nearbyInstances,
      activeMatches,
      patterns: allPatterns,
      tolerances,
    });

    if (decision.kind === 'matched') {
      const { candidate } = decision;
      if (existing && instanceKey(existing) === instanceKey(candidate.instance)) {
        return { kind: 'matched', match: existing };
      }

      const superseded = existing ? await this.supersede(existing) : undefined;
      let match: ReconciliationMatch;
      try {
        match = await matches.createActive({
          transactionId,
          seriesId: candidate.instance.seriesId,
          scheduledDate: candidate.instance.scheduledDate,
          source: 'auto',
          confidence: candidate.confidence,
          amountVariance: candidate.amountVariance,
          dateOffsetDays: candidate.dateOffsetDays,
        });
      } catch (error) {
        // Another write claimed the candidate after the old match was rejected
        if (existing && superseded && error instanceof MatchConflictError) {
          await this.restore(existing);
        }
        throw error;
      }

      logger.debug(
        `[${transactionId}] Auto-matched ${candidate.instance.seriesId}@${candidate.instance.scheduledDate} (${candidate.explanation})`
      );
      return { kind: 'matched', match, candidate, superseded };
    }

    const superseded = existing ? await this.supersede(existing) : undefined;

    if (decision.kind === 'ambiguous') {
      logger.warn(
        `[${transactionId}] Ambiguous: ${decision.report.candidates
          .map((c) => `${c.seriesId}@${c.scheduledDate}=${c.confidence}`)
          .join(', ')}`
      );
      throw new AmbiguousMatchError(decision.report);
    }

    return { kind: 'unmatched', suggestions: decision.suggestions, superseded };
  }

  /**
   * Evaluates every transaction in the range that has no Active match.
   * One transaction's failure never stops the sweep.
   */
  async sweep(from: CalendarDate, to: CalendarDate): Promise<SweepReport> {
    if (from > to) {
      throw AppError.badRequest(`Invalid range: ${from} is after ${to}`);
    }

    const report: SweepReport = {
      from,
      to,
      evaluated: 0,
      skipped: 0,
      matched: 0,
      unmatched: 0,
      ambiguous: 0,
      errored: 0,
    };

    const rows = await this.repositories.transactions.findBetween(from, to);
    for (const transaction of rows) {
      const active = await this.repositories.matches.findActiveByTransaction(transaction.id);
      if (active) {
        report.skipped++;
        continue;
      }

      report.evaluated++;
      try {
        const result = await this.evaluate(transaction.id);
        if (result.kind === 'unmatched') report.unmatched++;
        else report.matched++;
      } catch (error) {
        if (error instanceof AmbiguousMatchError) {
          report.ambiguous++;
        } else {
          report.errored++;
          logger.error(
            `[${transaction.id}] Sweep evaluation failed: ${error instanceof Error ? error.message : 'Unknown error'}`
          );
        }
      }
    }

    logger.info(
      `Sweep ${from}..${to}: ${report.evaluated} evaluated, ${report.matched} matched, ${report.ambiguous} ambiguous, ${report.errored} errored`
    );
    return report;
  }

  /**
   * Matched / Missing status of every instance scheduled in a month.
   */
  async getMonthlyStatus(year: number, month: number): Promise<MonthlyStatusReport> {
    const { from, to } = monthRange(year, month);
    const [scheduled, active] = await Promise.all([
      this.repositories.instances.findBetween(from, to),
      this.repositories.matches.findActiveBetween(from, to),
    ]);

    const byInstance = new Map(active.map((match) => [instanceKey(match), match]));

    const instances = scheduled.map((instance): InstanceStatus => {
      const match = byInstance.get(instanceKey(instance));
      const base = {
        seriesId: instance.seriesId,
        scheduledDate: instance.scheduledDate,
        expectedDescription: instance.expectedDescription,
        expectedAmount: instance.expectedAmount,
      };

      if (!match) {
        return { ...base, status: 'missing' };
      }
      return {
        ...base,
        status: 'matched',
        match: {
          id: match.id,
          transactionId: match.transactionId,
          source: match.source,
          confidence: match.confidence,
          amountVariance: match.amountVariance,
          dateOffsetDays: match.dateOffsetDays,
        },
      };
    });

    const matched = instances.filter((instance) => instance.status === 'matched').length;
    return { year, month, matched, missing: instances.length - matched, instances };
  }

  async getMatchesForTransaction(transactionId: string): Promise<ReconciliationMatch[]> {
    return this.repositories.matches.findByTransaction(transactionId);
  }

  async getMatchesForInstance(key: InstanceKey): Promise<ReconciliationMatch[]> {
    return this.repositories.matches.findByInstance(key);
  }

  private async supersede(match: ReconciliationMatch): Promise<ReconciliationMatch | undefined> {
    const rejected = await this.repositories.matches.reject(match.id, new Date());
    logger.debug(`[${match.transactionId}] Superseded auto match ${match.id}`);
    return rejected ?? undefined;
  }

  private async restore(match: ReconciliationMatch): Promise<void> {
    try {
      const restored = await this.repositories.matches.createActive({
        transactionId: match.transactionId,
        seriesId: match.seriesId,
        scheduledDate: match.scheduledDate,
        source: match.source,
        confidence: match.confidence,
        amountVariance: match.amountVariance,
        dateOffsetDays: match.dateOffsetDays,
      });
      logger.warn(`[${match.transactionId}] Restored auto match ${match.id} as ${restored.id}`);
    } catch (error) {
      if (!(error instanceof MatchConflictError)) {
        throw error;
      }
      logger.warn(`[${match.transactionId}] Auto match ${match.id} could not be restored: ${error.message}`);
    }
  }
}

export default ReconciliationService;
