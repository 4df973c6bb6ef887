/**
 * @fileoverview Flakiness tracker
 *
 * Owns the run history of every project it has seen. Ingestion for one project is serialized;
 * projects never wait on each other except for the shared file write.
 *
 * The tracker's in-memory history is authoritative once a project is loaded. When a save
 * fails, the computed state is kept and handed back with a `retry` that re-attempts only the
 * save.
 *
 * @packageDocumentation
 */

import { randomUUID } from 'node:crypto';
import type { StorageError } from '../core/errors.js';
import type { PersistenceFailure } from '../core/persistence.js';
import { Err, Ok, type Result } from '../core/result.js';
import { DEFAULT_CONFIG, type SentinelConfig } from '../config/index.js';
import type { TestRunReport } from '../report/types.js';
import { logDebug, logInfo, logWarning } from '../telemetry/logger.js';
import { KeyedSerialQueue } from '../utils/keyed_queue.js';
import { analyzeFlakyTests } from './flaky_analysis.js';
import type { HistoryStore } from './history_store.js';
import { computeTestTrends, projectHealthHistory, type HealthPoint, type TestTrends } from './trends.js';
import type { FlakyDocument, FlakyProjectEntry, FlakyTestEntry, RunRecord } from './types.js';

export type FlakinessSettings = Omit<SentinelConfig['flakiness'], 'storageDir'>;

export interface FlakinessTrackerOptions extends Partial<FlakinessSettings> {
  now?: () => Date;
}

export interface RunIngestion {
  readonly project: string;
  readonly run: RunRecord;
  readonly retainedRuns: number;
  /** Flaky tests after this run, most flaky first */
  readonly flakyTests: readonly FlakyTestEntry[];
}

export type IngestFailure = StorageError | PersistenceFailure<RunIngestion>;

export function toRunRecord(report: TestRunReport, runId: string, timestamp: Date): RunRecord {
  const tests: RunRecord['tests'] = {};
  for (const testCase of report.cases) {
    tests[testCase.id] = {
      outcome: testCase.outcome,
      duration: testCase.duration,
      error: testCase.error?.message ?? null,
    };
  }
  return {
    runId,
    timestamp: timestamp.toISOString(),
    summary: { ...report.counts, duration: report.duration },
    tests,
  };
}

export class FlakinessTracker {
  private readonly settings: FlakinessSettings;
  private readonly now: () => Date;
  private readonly queue = new KeyedSerialQueue();
  private readonly runs = new Map<string, RunRecord[]>();
  private readonly flaky = new Map<string, FlakyProjectEntry>();

  constructor(
    private readonly store: HistoryStore,
    options: FlakinessTrackerOptions = {},
  ) {
    const { now, ...settings } = options;
    const { storageDir: _storageDir, ...defaults } = DEFAULT_CONFIG.flakiness;
    this.settings = { ...defaults, ...settings };
    this.now = now ?? (() => new Date());
  }

  /**
   * Record one run, prune the project's history and recompute its flaky tests.
   */
  ingestRun(
    project: string,
    report: TestRunReport,
    runId?: string,
  ): Promise<Result<RunIngestion, IngestFailure>> {
    return this.queue.run(project, async () => {
      const loaded = await this.projectRuns(project);
      if (!loaded.ok) return loaded;

      const timestamp = this.now();
      const run = toRunRecord(report, runId ?? randomUUID(), timestamp);
      const retained = [...loaded.value, run].slice(-this.settings.historyRetention);
      const tests = analyzeFlakyTests(retained, timestamp, this.settings);
      const entry: FlakyProjectEntry = { updatedAt: timestamp.toISOString(), tests };

      this.runs.set(project, retained);
      this.flaky.set(project, entry);

      const ingestion: RunIngestion = Object.freeze({
        project,
        run,
        retainedRuns: retained.length,
        flakyTests: Object.freeze(
          Object.values(tests).sort((a, b) => b.flakinessScore - a.flakinessScore || a.testId.localeCompare(b.testId)),
        ),
      });

      if (ingestion.flakyTests.length > 0) {
        logInfo('Flaky tests detected', { project, count: ingestion.flakyTests.length });
      }
      return this.persist(project, ingestion);
    });
  }

  /**
   * Latest flaky analysis, for one project or all of them.
   */
  async getFlakyTests(project?: string): Promise<Result<FlakyDocument, StorageError>> {
    const stored = await this.store.loadFlaky();
    if (!stored.ok) return stored;
    const merged: FlakyDocument = { ...stored.value, ...Object.fromEntries(this.flaky) };
    if (project === undefined) return Ok(merged);
    const entry = merged[project];
    return Ok(entry ? { [project]: entry } : {});
  }

  async getTestTrends(
    project: string,
    testId: string,
    options: { days?: number } = {},
  ): Promise<Result<TestTrends | undefined, StorageError>> {
    const runs = await this.projectRuns(project);
    if (!runs.ok) return runs;
    return Ok(
      computeTestTrends(runs.value, testId, {
        days: options.days ?? this.settings.trendDays,
        now: this.now(),
        sampleSize: this.settings.regressionSampleSize,
        factor: this.settings.regressionFactor,
      }),
    );
  }

  async getProjectHealthHistory(project: string, days?: number): Promise<Result<HealthPoint[], StorageError>> {
    const runs = await this.projectRuns(project);
    if (!runs.ok) return runs;
    return Ok(projectHealthHistory(runs.value, days ?? this.settings.healthDays, this.now()));
  }

  /** Resolves once all queued ingestions have settled. */
  drain(): Promise<void> {
    return this.queue.drain();
  }

  private async projectRuns(project: string): Promise<Result<RunRecord[], StorageError>> {
    const cached = this.runs.get(project);
    if (cached) return Ok(cached);
    const loaded = await this.store.loadRuns(project);
    if (loaded.ok) {
      this.runs.set(project, loaded.value);
      logDebug('Loaded run history', { project, runs: loaded.value.length, store: this.store.location });
    }
    return loaded;
  }

  private async persist(
    project: string,
    ingestion: RunIngestion,
  ): Promise<Result<RunIngestion, PersistenceFailure<RunIngestion>>> {
    const runs = this.runs.get(project) ?? [];
    const flaky = this.flaky.get(project) ?? { updatedAt: ingestion.run.timestamp, tests: {} };
    const saved = await this.store.saveProject(project, runs, flaky);
    if (saved.ok) return Ok(ingestion);

    logWarning('Failed to persist run history; state kept in memory', {
      project,
      error: saved.error.message,
    });
    return Err({
      error: saved.error,
      state: ingestion,
      retry: () => this.queue.run(project, () => this.persist(project, ingestion)),
    });
  }
}
