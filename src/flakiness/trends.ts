/**
 * @fileoverview Per-test duration trends and project health over time
 *
 * Regression detection is an early-warning heuristic: with at least `sampleSize` recorded
 * durations, a test regressed when the mean of its newest `sampleSize` durations exceeds
 * `factor` times the mean of all durations in the period.
 */

import type { RunRecord, RunTestEntry } from './types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export interface DurationStats {
  mean: number;
  median: number;
  /** Sample standard deviation; 0 with fewer than two durations */
  stdDev: number;
  min: number;
  max: number;
}

export interface TrendRun {
  timestamp: string;
  outcome: RunTestEntry['outcome'];
  duration: number;
}

export interface TestTrends {
  testId: string;
  periodDays: number;
  totalRuns: number;
  outcomes: { passed: number; failed: number; skipped: number; error: number };
  /** Percentage of runs in the period that passed */
  successRate: number;
  durationStats: DurationStats;
  performanceRegression: boolean;
  /** recent mean / overall mean, present when a regression was flagged */
  regressionFactor?: number;
  /** Newest runs, oldest first */
  recentRuns: TrendRun[];
}

export interface TrendOptions {
  days: number;
  now: Date;
  sampleSize?: number;
  factor?: number;
  recentRunCount?: number;
}

export interface HealthPoint {
  timestamp: string;
  successRate: number;
  totalTests: number;
  failedTests: number;
  duration: number;
}

function mean(values: readonly number[]): number {
  return values.reduce((sum, value) => sum + value, 0) / values.length;
}

function median(values: readonly number[]): number {
  const sorted = [...values].sort((a, b) => a - b);
  const middle = Math.floor(sorted.length / 2);
  const upper = sorted[middle] ?? 0;
  if (sorted.length % 2 === 1) return upper;
  return ((sorted[middle - 1] ?? upper) + upper) / 2;
}

function sampleStdDev(values: readonly number[]): number {
  if (values.length < 2) return 0;
  const average = mean(values);
  const squared = values.reduce((sum, value) => sum + (value - average) ** 2, 0);
  return Math.sqrt(squared / (values.length - 1));
}

export function durationStats(durations: readonly number[]): DurationStats {
  if (durations.length === 0) {
    return { mean: 0, median: 0, stdDev: 0, min: 0, max: 0 };
  }
  return {
    mean: mean(durations),
    median: median(durations),
    stdDev: sampleStdDev(durations),
    min: Math.min(...durations),
    max: Math.max(...durations),
  };
}

function withinPeriod(run: RunRecord, cutoff: number): boolean {
  const time = Date.parse(run.timestamp);
  return Number.isFinite(time) && time >= cutoff;
}

/**
 * Trends for one test over the last `days`. Undefined when the test has no runs in the period.
 */
export function computeTestTrends(
  runs: readonly RunRecord[],
  testId: string,
  options: TrendOptions,
): TestTrends | undefined {
  const sampleSize = options.sampleSize ?? 5;
  const factor = options.factor ?? 1.5;
  const cutoff = options.now.getTime() - options.days * DAY_MS;

  const relevant: TrendRun[] = [];
  for (const run of runs) {
    const entry = run.tests[testId];
    if (entry && withinPeriod(run, cutoff)) {
      relevant.push({ timestamp: run.timestamp, outcome: entry.outcome, duration: entry.duration });
    }
  }
  if (relevant.length === 0) return undefined;

  const outcomes = { passed: 0, failed: 0, skipped: 0, error: 0 };
  for (const run of relevant) {
    outcomes[run.outcome] += 1;
  }
  const durations = relevant.map((run) => run.duration).filter((duration) => duration > 0);

  const trends: TestTrends = {
    testId,
    periodDays: options.days,
    totalRuns: relevant.length,
    outcomes,
    successRate: (outcomes.passed / relevant.length) * 100,
    durationStats: durationStats(durations),
    performanceRegression: false,
    recentRuns: relevant.slice(-(options.recentRunCount ?? 10)),
  };

  if (durations.length >= sampleSize) {
    const recentMean = mean(durations.slice(-sampleSize));
    const overallMean = mean(durations);
    if (recentMean > overallMean * factor) {
      trends.performanceRegression = true;
      trends.regressionFactor = recentMean / overallMean;
    }
  }

  return trends;
}

/**
 * Success rate of every non-empty run in the last `days`, oldest first.
 */
export function projectHealthHistory(runs: readonly RunRecord[], days: number, now: Date): HealthPoint[] {
  const cutoff = now.getTime() - days * DAY_MS;
  return runs
    .filter((run) => withinPeriod(run, cutoff) && run.summary.total > 0)
    .map((run) => ({
      timestamp: run.timestamp,
      successRate: (run.summary.passed / run.summary.total) * 100,
      totalTests: run.summary.total,
      failedTests: run.summary.failed + run.summary.errored,
      duration: run.summary.duration,
    }));
}
