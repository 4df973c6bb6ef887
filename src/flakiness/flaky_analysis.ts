/**
 * @fileoverview Flaky test detection
 *
 * Only the project's last `window` runs are analyzed; each test's outcomes are collected from
 * the runs it appears in. A test is flaky when it has at least `minRuns` outcomes there,
 * including at least one pass and one failure:
 *
 *   flakinessScore = 1 - |passes - failures| / windowSize
 *
 * Purely failing or purely skipped tests are never flaky; they are consistently broken.
 */

import type { TestOutcome } from '../report/types.js';
import { roundTo } from '../record/record_builder.js';
import { OutcomeWindow } from './outcome_window.js';
import { outcomeLetter, type FlakyTestEntry, type RunRecord } from './types.js';

export interface FlakyAnalysisOptions {
  window: number;
  minRuns: number;
  patternLength: number;
}

export const DEFAULT_FLAKY_ANALYSIS: FlakyAnalysisOptions = {
  window: 20,
  minRuns: 3,
  patternLength: 10,
};

/**
 * Replay the last `window` runs (oldest first) into one window per test id.
 */
export function collectOutcomeWindows(
  runs: readonly RunRecord[],
  window: number,
): Map<string, OutcomeWindow<TestOutcome>> {
  const windows = new Map<string, OutcomeWindow<TestOutcome>>();
  for (const run of runs.slice(-window)) {
    for (const [testId, entry] of Object.entries(run.tests)) {
      let outcomes = windows.get(testId);
      if (!outcomes) {
        outcomes = new OutcomeWindow<TestOutcome>(window);
        windows.set(testId, outcomes);
      }
      outcomes.push(entry.outcome);
    }
  }
  return windows;
}

/**
 * Entry for one test, or undefined when the outcomes do not make it flaky.
 */
export function computeFlakyEntry(
  testId: string,
  outcomes: readonly TestOutcome[],
  detectedAt: Date,
  options: Pick<FlakyAnalysisOptions, 'minRuns' | 'patternLength'> = DEFAULT_FLAKY_ANALYSIS,
): FlakyTestEntry | undefined {
  const total = outcomes.length;
  const lastOutcome = outcomes[total - 1];
  if (total < options.minRuns || lastOutcome === undefined) return undefined;

  const passed = outcomes.filter((outcome) => outcome === 'passed').length;
  const failed = outcomes.filter((outcome) => outcome === 'failed').length;
  if (passed === 0 || failed === 0) return undefined;

  return {
    testId,
    flakinessScore: roundTo(1 - Math.abs(passed - failed) / total, 3),
    passRate: roundTo((passed / total) * 100, 1),
    failRate: roundTo((failed / total) * 100, 1),
    totalRuns: total,
    recentPattern: outcomes.slice(-options.patternLength).map(outcomeLetter).join(''),
    lastOutcome,
    detectedAt: detectedAt.toISOString(),
  };
}

export function analyzeFlakyTests(
  runs: readonly RunRecord[],
  detectedAt: Date,
  options: FlakyAnalysisOptions = DEFAULT_FLAKY_ANALYSIS,
): Record<string, FlakyTestEntry> {
  const flaky: Record<string, FlakyTestEntry> = {};
  if (Math.min(runs.length, options.window) < options.minRuns) return flaky;
  for (const [testId, outcomes] of collectOutcomeWindows(runs, options.window)) {
    const entry = computeFlakyEntry(testId, outcomes.toArray(), detectedAt, options);
    if (entry) flaky[testId] = entry;
  }
  return flaky;
}
