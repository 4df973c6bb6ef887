/**
 * @fileoverview Test-run report types
 *
 * A report is only ever built by `parseTestRunReport`, which recomputes every aggregate from
 * the case list. The aggregate supplied by whoever produced the report is kept in `declared`
 * for audit and never used for decisions.
 */

export const TEST_OUTCOMES = ['passed', 'failed', 'skipped', 'error'] as const;

export type TestOutcome = (typeof TEST_OUTCOMES)[number];

export const ERROR_CATEGORIES = [
  'assertion_failure',
  'import_error',
  'timeout',
  'connection_error',
  'unknown_error',
] as const;

export type ErrorCategory = (typeof ERROR_CATEGORIES)[number];

export interface ErrorSummary {
  readonly category: ErrorCategory;
  /** Truncated to the configured error message limit */
  readonly message: string;
}

export interface TestCaseResult {
  readonly id: string;
  readonly outcome: TestOutcome;
  /** Seconds, never negative */
  readonly duration: number;
  readonly error?: ErrorSummary;
}

export interface RunCounts {
  readonly total: number;
  readonly passed: number;
  readonly failed: number;
  readonly skipped: number;
  readonly errored: number;
}

export interface DeclaredCounts {
  readonly total?: number;
  readonly passed?: number;
  readonly failed?: number;
  readonly skipped?: number;
}

export interface TestRunReport {
  readonly cases: readonly TestCaseResult[];
  /** Always derived from `cases` */
  readonly counts: RunCounts;
  /** Declared duration when supplied, otherwise the sum of case durations */
  readonly duration: number;
  readonly declared: DeclaredCounts;
  /** False when the declared aggregate disagrees with the case list */
  readonly countsConsistent: boolean;
}

/** Cases that block deployment: explicit failures and errors. */
export function isFailingOutcome(outcome: TestOutcome): boolean {
  return outcome === 'failed' || outcome === 'error';
}
