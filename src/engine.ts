/**
 * @fileoverview Trust engine
 *
 * Wires the record builder, claim checker, signal aggregator, flakiness tracker and alert
 * monitor together from one resolved configuration. Each operation takes untyped input,
 * validates it, and returns a Result; monitoring and history persistence results are passed
 * through untouched so the caller decides whether to retry a failed write.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { checkClaim, type DetectionResult } from './claims/claim_checker.js';
import type { MalformedReportError, ValidationError } from './core/errors.js';
import { Ok, type Result } from './core/result.js';
import type { SentinelConfig } from './config/index.js';
import { JsonFileHistoryStore, type HistoryStore } from './flakiness/history_store.js';
import { FlakinessTracker, type IngestFailure, type RunIngestion } from './flakiness/tracker.js';
import { AlertMonitor, type MonitorResult } from './monitoring/alert_monitor.js';
import type { ProjectMetricsStore } from './monitoring/metrics_store.js';
import { verifyRecordJson, type RecordVerification } from './record/hash_verifier.js';
import { buildRecordFromReport } from './record/record_builder.js';
import type { ImmutableRecord } from './record/types.js';
import { parseTestRunReport } from './report/parse.js';
import type { TestRunReport } from './report/types.js';
import { computeDeceptionScore, parseSignalBundle, recommendationsFor, type DeceptionScore } from './signals/aggregator.js';
import { deriveReportSignals, type ReportSignals } from './signals/report_signals.js';
import { logDebug, setLogLevel } from './telemetry/logger.js';

export interface TrustEngineDeps {
  /** Defaults to a JSON file store under `flakiness.storageDir` */
  historyStore?: HistoryStore;
  metrics?: ProjectMetricsStore;
  now?: () => Date;
}

export interface ClaimVerification {
  readonly record: ImmutableRecord;
  readonly detection: DetectionResult;
  readonly signals: ReportSignals;
  readonly monitoring: MonitorResult;
}

export interface ProjectAssessment {
  readonly score: DeceptionScore;
  readonly recommendations: readonly string[];
  readonly monitoring: MonitorResult;
}

export interface TrustEngine {
  readonly config: SentinelConfig;
  readonly monitor: AlertMonitor;
  readonly tracker: FlakinessTracker;
  /** Build a record from `report`, check `claim` against it and record the outcome. */
  verifyClaim(project: string, report: unknown, claim: string): Promise<Result<ClaimVerification, MalformedReportError>>;
  /** Score a signal bundle and record its indicators. */
  scoreProject(project: string, signals: unknown): Promise<Result<ProjectAssessment, ValidationError>>;
  ingestRun(
    project: string,
    report: unknown,
    runId?: string,
  ): Promise<Result<RunIngestion, MalformedReportError | IngestFailure>>;
  verifyRecord(record: unknown): RecordVerification;
}

export function createTrustEngine(config: SentinelConfig, deps: TrustEngineDeps = {}): TrustEngine {
  setLogLevel(config.logLevel);
  const now = deps.now ?? (() => new Date());

  const { storageDir, ...flakiness } = config.flakiness;
  const tracker = new FlakinessTracker(deps.historyStore ?? new JsonFileHistoryStore(path.resolve(storageDir)), {
    ...flakiness,
    now,
  });
  const monitor = new AlertMonitor({ ...config.monitoring, metrics: deps.metrics, now });

  const parseReport = (input: unknown): Result<TestRunReport, MalformedReportError> =>
    parseTestRunReport(input, { errorMessageLimit: config.record.errorMessageLimit });

  logDebug('Trust engine created', { storageDir, logDir: config.monitoring.logDir });

  return {
    config,
    monitor,
    tracker,

    async verifyClaim(project, input, claim) {
      const report = parseReport(input);
      if (!report.ok) return report;

      const record = buildRecordFromReport(report.value, { precision: config.record.precision, now });
      const detection = checkClaim(claim, record, config.claims);
      const signals = deriveReportSignals(report.value, config.signals);
      const monitoring = await monitor.recordClaimCheck(project, detection, {
        bindingHash: record.verification.hash,
        instantTests: signals.instantTests,
        perfectSuite: signals.perfectSuite,
      });
      return Ok({ record, detection, signals, monitoring });
    },

    async scoreProject(project, input) {
      const signals = parseSignalBundle(input);
      if (!signals.ok) return signals;

      const score = computeDeceptionScore(project, signals.value, { ...config.signals, now });
      const monitoring = await monitor.recordDeceptionScore(project, score);
      return Ok({ score, recommendations: recommendationsFor(score), monitoring });
    },

    async ingestRun(project, input, runId) {
      const report = parseReport(input);
      if (!report.ok) return report;
      return tracker.ingestRun(project, report.value, runId);
    },

    verifyRecord(record) {
      return verifyRecordJson(record, { precision: config.record.precision });
    },
  };
}
