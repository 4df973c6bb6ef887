/**
 * @fileoverview Immutable record construction
 *
 * Freezes the facts of one test run and binds them with a sha256 digest. Counts always come
 * from the case list: a report whose summary says "0 failed" while listing failing cases
 * produces a record with the real failure count.
 *
 * @packageDocumentation
 */

import type { MalformedReportError } from '../core/errors.js';
import { mapResult, type Result } from '../core/result.js';
import { parseTestRunReport } from '../report/parse.js';
import { isFailingOutcome, type TestRunReport } from '../report/types.js';
import { logWarning } from '../telemetry/logger.js';
import { computeBindingHash, DEFAULT_RATE_PRECISION } from './canonical.js';
import {
  RECORD_ALGORITHM,
  RECORD_VERSION,
  type FailedCaseDetail,
  type ImmutableRecord,
  type RecordFacts,
} from './types.js';

export interface BuildRecordOptions {
  /** Decimal places kept in `exact_success_rate` */
  precision?: number;
  errorMessageLimit?: number;
  now?: () => Date;
}

export function roundTo(value: number, precision: number): number {
  const factor = 10 ** precision;
  return Math.round(value * factor) / factor;
}

/**
 * `passed / total * 100` rounded to `precision`; an empty run is 0.
 */
export function computeSuccessRate(passed: number, total: number, precision = DEFAULT_RATE_PRECISION): number {
  if (total <= 0) return 0;
  return roundTo((passed / total) * 100, precision);
}

export function deriveFacts(report: TestRunReport, precision = DEFAULT_RATE_PRECISION): RecordFacts {
  const { total, passed, failed, skipped, errored } = report.counts;
  const failedCount = failed + errored;
  return Object.freeze({
    total_test_count: total,
    passed_count: passed,
    failed_count: failedCount,
    skipped_count: skipped,
    exact_success_rate: computeSuccessRate(passed, total, precision),
    deployment_allowed: failedCount === 0,
  });
}

export function deriveFailedCaseDetails(report: TestRunReport): readonly FailedCaseDetail[] {
  return Object.freeze(
    report.cases
      .filter((testCase) => isFailingOutcome(testCase.outcome))
      .map((testCase) =>
        Object.freeze({
          name: testCase.id,
          error_category: testCase.error?.category ?? 'unknown_error',
        }),
      ),
  );
}

/**
 * Build a record from an already-parsed report.
 */
export function buildRecordFromReport(report: TestRunReport, options: BuildRecordOptions = {}): ImmutableRecord {
  const precision = options.precision ?? DEFAULT_RATE_PRECISION;
  const now = options.now ?? (() => new Date());

  if (!report.countsConsistent) {
    logWarning('Declared report counts disagree with test cases; using counts derived from cases', {
      declared: report.declared,
      derived: report.counts,
    });
  }

  const facts = deriveFacts(report, precision);
  const failedCaseDetails = deriveFailedCaseDetails(report);

  return Object.freeze({
    facts,
    failed_case_details: failedCaseDetails,
    verification: Object.freeze({
      version: RECORD_VERSION,
      algorithm: RECORD_ALGORITHM,
      hash: computeBindingHash(facts, failedCaseDetails, precision),
      timestamp: now().toISOString(),
    }),
  });
}

/**
 * Parse a raw report and build its immutable record. Pure apart from reading the clock.
 */
export function buildImmutableRecord(
  input: unknown,
  options: BuildRecordOptions = {},
): Result<ImmutableRecord, MalformedReportError> {
  return mapResult(
    parseTestRunReport(input, { errorMessageLimit: options.errorMessageLimit }),
    (report) => buildRecordFromReport(report, options),
  );
}
