import type { TestRunReport } from '../report/types.js';
import { DEFAULT_CONFIG } from '../config/index.js';

export interface ReportSignals {
  /** Passed cases faster than the instant threshold */
  readonly instantTests: number;
  readonly instantTestRatio: number;
  /** Nothing failed in a suite large enough for that to be unlikely */
  readonly perfectSuite: boolean;
}

export interface ReportSignalOptions {
  instantTestSeconds?: number;
  perfectSuiteMinTests?: number;
}

/**
 * Signals that can be read straight off a report, without looking at source code.
 */
export function deriveReportSignals(report: TestRunReport, options: ReportSignalOptions = {}): ReportSignals {
  const instantSeconds = options.instantTestSeconds ?? DEFAULT_CONFIG.signals.instantTestSeconds;
  const perfectMin = options.perfectSuiteMinTests ?? DEFAULT_CONFIG.signals.perfectSuiteMinTests;
  const { total, failed, errored } = report.counts;

  const instantTests = report.cases.filter(
    (testCase) => testCase.outcome === 'passed' && testCase.duration < instantSeconds,
  ).length;

  return {
    instantTests,
    instantTestRatio: total > 0 ? instantTests / total : 0,
    perfectSuite: failed + errored === 0 && total > perfectMin,
  };
}
