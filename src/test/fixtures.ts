/**
 * Shared builders for test-run reports used across test suites.
 */

import type { RawTestRunReport } from '../report/parse.js';
import type { TestOutcome } from '../report/types.js';

export const FIXED_NOW = new Date('2026-03-14T09:30:00.000Z');

export const fixedClock = (): Date => FIXED_NOW;

export interface CaseInput {
  id: string;
  outcome: TestOutcome;
  duration?: number;
  error?: string;
}

/** A raw report whose declared counts match its cases. */
export function rawReport(cases: CaseInput[]): RawTestRunReport {
  const count = (outcome: TestOutcome): number => cases.filter((c) => c.outcome === outcome).length;
  return {
    total: cases.length,
    passed: count('passed'),
    failed: count('failed') + count('error'),
    skipped: count('skipped'),
    tests: cases.map((c) => ({
      id: c.id,
      outcome: c.outcome,
      duration: c.duration ?? 0.5,
      ...(c.error !== undefined ? { error: c.error } : {}),
    })),
  };
}

/** `passed` passing cases followed by `failed` failing ones. */
export function mixedReport(passed: number, failed: number): RawTestRunReport {
  const cases: CaseInput[] = [];
  for (let i = 0; i < passed; i += 1) {
    cases.push({ id: `tests/test_ok.py::test_${i}`, outcome: 'passed' });
  }
  for (let i = 0; i < failed; i += 1) {
    cases.push({ id: `tests/test_bad.py::test_${i}`, outcome: 'failed', error: 'AssertionError: values differ' });
  }
  return rawReport(cases);
}
