/**
 * @fileoverview Alert monitor
 *
 * Accumulates claim-check and deception-score results per project and fires an alert when a
 * project's detection count reaches the threshold. Counters change synchronously inside the
 * recording call, so the threshold check, the callbacks and the reset see a consistent count
 * even when recordings for one project overlap. Only the log append is asynchronous.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import { CallbackError, toError, type StorageError } from '../core/errors.js';
import type { PersistenceFailure } from '../core/persistence.js';
import { Err, Ok, type Result } from '../core/result.js';
import { maxSeverity } from '../core/severity.js';
import type { DetectionResult } from '../claims/claim_checker.js';
import { DEFAULT_CONFIG } from '../config/index.js';
import { roundTo } from '../record/record_builder.js';
import type { DeceptionScore } from '../signals/aggregator.js';
import { logDebug, logError, logInfo, logWarning } from '../telemetry/logger.js';
import { writeJsonAtomic } from '../utils/atomic_file.js';
import { DetectionLog, type DetectionEvent, type DetectionSource } from './detection_log.js';
import { ProjectMetricsStore, type Finding, type ProjectMetrics } from './metrics_store.js';

// ============================================================================
// TYPES
// ============================================================================

export interface Alert {
  readonly project: string;
  readonly timestamp: string;
  readonly hallucinationCount: number;
  readonly totalChecks: number;
  readonly severityBreakdown: ProjectMetrics['severityBreakdown'];
  readonly patternBreakdown: ProjectMetrics['patternBreakdown'];
}

export type AlertCallback = (alert: Alert) => void | Promise<void>;

export interface MonitorOutcome {
  readonly event: DetectionEvent;
  /** Metrics after this recording, including any reset caused by an alert */
  readonly metrics: ProjectMetrics;
  readonly alert?: Alert;
  readonly callbackErrors: readonly CallbackError[];
}

export type MonitorResult = Result<MonitorOutcome, PersistenceFailure<MonitorOutcome>>;

export interface AlertMonitorOptions {
  logDir?: string;
  alertThreshold?: number;
  enableAlerts?: boolean;
  summaryIntervalMs?: number;
  metrics?: ProjectMetricsStore;
  now?: () => Date;
}

export interface ProjectSummary {
  /** Detections since the last alert per check, as a percentage */
  readonly hallucinationRate: number;
  readonly totalChecks: number;
  readonly topPatterns: ReadonlyArray<readonly [string, number]>;
}

export interface MonitoringSummary {
  readonly timestamp: string;
  readonly projects: Readonly<Record<string, ProjectSummary>>;
}

const TOP_PATTERN_COUNT = 5;

interface RegisteredCallback {
  readonly name: string;
  readonly callback: AlertCallback;
}

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

/** `hallucination_summary_YYYYMMDD_HH.json`, in UTC */
export function summaryFileName(at: Date): string {
  const stamp = `${at.getUTCFullYear()}${pad(at.getUTCMonth() + 1)}${pad(at.getUTCDate())}_${pad(at.getUTCHours())}`;
  return `hallucination_summary_${stamp}.json`;
}

// ============================================================================
// MONITOR
// ============================================================================

export class AlertMonitor {
  readonly logDir: string;
  private readonly alertThreshold: number;
  private readonly enableAlerts: boolean;
  private readonly summaryIntervalMs: number;
  private readonly metrics: ProjectMetricsStore;
  private readonly log: DetectionLog;
  private readonly now: () => Date;
  private callbacks: RegisteredCallback[] = [];
  private summaryTimer?: ReturnType<typeof setInterval>;

  constructor(options: AlertMonitorOptions = {}) {
    const defaults = DEFAULT_CONFIG.monitoring;
    this.logDir = options.logDir ?? defaults.logDir;
    this.alertThreshold = options.alertThreshold ?? defaults.alertThreshold;
    this.enableAlerts = options.enableAlerts ?? defaults.enableAlerts;
    this.summaryIntervalMs = options.summaryIntervalMs ?? defaults.summaryIntervalMs;
    this.metrics = options.metrics ?? new ProjectMetricsStore();
    this.log = new DetectionLog(this.logDir);
    this.now = options.now ?? (() => new Date());
  }

  recordClaimCheck(
    project: string,
    detection: DetectionResult,
    context: Record<string, unknown> = {},
  ): Promise<MonitorResult> {
    const findings = detection.discrepancies.map((discrepancy) => ({
      kind: discrepancy.kind,
      severity: discrepancy.severity,
      detail: discrepancy.explanation,
    }));
    return this.recordFindings(project, findings, {
      source: 'claim_check',
      context: { ...context, trustScore: detection.trustScore },
    });
  }

  recordDeceptionScore(
    project: string,
    score: DeceptionScore,
    context: Record<string, unknown> = {},
  ): Promise<MonitorResult> {
    const findings = score.indicators.map((indicator) => ({
      kind: indicator.kind,
      severity: indicator.severity,
      detail: `value ${indicator.value}`,
    }));
    return this.recordFindings(project, findings, {
      source: 'deception_score',
      context: {
        ...context,
        overallDeceptionScore: score.overallDeceptionScore,
        trustScore: score.trustScore,
        tier: score.tier,
      },
    });
  }

  /**
   * Count one check for `project`, alert if the detection threshold is reached, then append the
   * event to the project's detection log. A failed append keeps the counters and the alert; the
   * returned `retry` re-attempts only the append.
   */
  recordFindings(
    project: string,
    findings: readonly Finding[],
    options: { source?: DetectionSource; context?: Record<string, unknown> } = {},
  ): Promise<MonitorResult> {
    const at = this.now();
    const severity = maxSeverity(findings.map((finding) => finding.severity));
    const event: DetectionEvent = {
      timestamp: at.toISOString(),
      project,
      source: options.source ?? 'findings',
      hallucinationDetected: findings.length > 0,
      maxSeverity: severity ?? null,
      findings: findings.map((finding) => ({ ...finding })),
      context: options.context ?? {},
    };

    let metrics = this.metrics.recordCheck(project, findings);

    if (severity === 'critical') {
      logError('Critical hallucination detected', { project, source: event.source, findings: findings.length });
    } else if (event.hallucinationDetected) {
      logInfo('Hallucination detected', { project, source: event.source, findings: findings.length, severity });
    } else {
      logDebug('Check passed', { project, source: event.source });
    }

    let alert: Alert | undefined;
    let callbackErrors: Promise<CallbackError[]> = Promise.resolve([]);
    if (this.enableAlerts && metrics.hallucinationsDetected >= this.alertThreshold) {
      alert = Object.freeze({
        project,
        timestamp: at.toISOString(),
        hallucinationCount: metrics.hallucinationsDetected,
        totalChecks: metrics.totalChecks,
        severityBreakdown: metrics.severityBreakdown,
        patternBreakdown: metrics.patternBreakdown,
      });
      callbackErrors = this.triggerAlert(alert);
      this.metrics.resetDetections(project);
      metrics = this.metrics.get(project) ?? metrics;
    }

    return this.settleRecording(event, metrics, alert, callbackErrors, this.log.append(event));
  }

  private async settleRecording(
    event: DetectionEvent,
    metrics: ProjectMetrics,
    alert: Alert | undefined,
    pendingErrors: Promise<CallbackError[]>,
    pendingAppend: Promise<Result<void, StorageError>>,
  ): Promise<MonitorResult> {
    const [callbackErrors, appended] = await Promise.all([pendingErrors, pendingAppend]);
    const outcome: MonitorOutcome = Object.freeze({
      event,
      metrics,
      ...(alert ? { alert } : {}),
      callbackErrors: Object.freeze(callbackErrors),
    });
    return this.toMonitorResult(outcome, appended);
  }

  /**
   * Register an alert callback. Callbacks are invoked in registration order; a returned promise
   * is awaited before the recording resolves. Returns a function that removes it again.
   */
  addAlertCallback(callback: AlertCallback, name?: string): () => void {
    const registered: RegisteredCallback = {
      name: name ?? (callback.name || `callback#${this.callbacks.length + 1}`),
      callback,
    };
    this.callbacks = [...this.callbacks, registered];
    return () => {
      this.callbacks = this.callbacks.filter((entry) => entry !== registered);
    };
  }

  getMetrics(project: string): ProjectMetrics | undefined;
  getMetrics(): Record<string, ProjectMetrics>;
  getMetrics(project?: string): ProjectMetrics | Record<string, ProjectMetrics> | undefined {
    return project === undefined ? this.metrics.all() : this.metrics.get(project);
  }

  /** Events recorded for a project, oldest first. */
  readDetectionLog(project: string): Promise<Result<DetectionEvent[], StorageError>> {
    return this.log.read(project);
  }

  buildSummary(): MonitoringSummary {
    const projects: Record<string, ProjectSummary> = {};
    for (const [project, metrics] of Object.entries(this.metrics.all())) {
      const rate = metrics.totalChecks > 0 ? (metrics.hallucinationsDetected / metrics.totalChecks) * 100 : 0;
      projects[project] = {
        hallucinationRate: roundTo(rate, 2),
        totalChecks: metrics.totalChecks,
        topPatterns: Object.entries(metrics.patternBreakdown)
          .sort((a, b) => b[1] - a[1])
          .slice(0, TOP_PATTERN_COUNT),
      };
    }
    return { timestamp: this.now().toISOString(), projects };
  }

  /** Write the current summary into the log directory and return its path. */
  async writeSummary(): Promise<Result<string, StorageError>> {
    const summary = this.buildSummary();
    const filePath = path.join(this.logDir, summaryFileName(new Date(summary.timestamp)));
    const written = await writeJsonAtomic(filePath, summary);
    if (!written.ok) return written;
    logInfo('Wrote monitoring summary', { path: filePath, projects: Object.keys(summary.projects).length });
    return Ok(filePath);
  }

  /**
   * Write a summary every `intervalMs`. The timer does not keep the process alive and can be
   * stopped at any time; summaries only read counters.
   */
  startPeriodicSummary(intervalMs: number = this.summaryIntervalMs): void {
    if (this.summaryTimer) return;
    this.summaryTimer = setInterval(() => {
      void this.writeSummary().then((result) => {
        if (!result.ok) {
          logWarning('Periodic summary failed', { error: result.error.message });
        }
      });
    }, intervalMs);
    this.summaryTimer.unref();
    logInfo('Periodic monitoring summary started', { intervalMs });
  }

  stopPeriodicSummary(): void {
    if (!this.summaryTimer) return;
    clearInterval(this.summaryTimer);
    this.summaryTimer = undefined;
    logInfo('Periodic monitoring summary stopped');
  }

  get periodicSummaryActive(): boolean {
    return this.summaryTimer !== undefined;
  }

  /** Invokes every callback before returning; the promise settles once async callbacks have. */
  private triggerAlert(alert: Alert): Promise<CallbackError[]> {
    logWarning('Detection threshold reached', {
      project: alert.project,
      hallucinationCount: alert.hallucinationCount,
      totalChecks: alert.totalChecks,
    });

    const settled = this.callbacks.map(({ name, callback }): Promise<CallbackError | undefined> => {
      try {
        const result = callback(alert);
        if (result instanceof Promise) {
          return result.then(
            () => undefined,
            (error: unknown) => this.callbackFailed(name, alert, error),
          );
        }
        return Promise.resolve(undefined);
      } catch (error) {
        return Promise.resolve(this.callbackFailed(name, alert, error));
      }
    });
    return Promise.all(settled).then((results) =>
      results.filter((error): error is CallbackError => error !== undefined),
    );
  }

  private callbackFailed(name: string, alert: Alert, error: unknown): CallbackError {
    const failure = new CallbackError(name, alert.project, toError(error));
    logError('Alert callback failed', { callback: name, project: alert.project, error: failure.cause.message });
    return failure;
  }

  private toMonitorResult(outcome: MonitorOutcome, appended: Result<void, StorageError>): MonitorResult {
    if (appended.ok) return Ok(outcome);

    logWarning('Failed to append detection event; counters kept', {
      project: outcome.event.project,
      error: appended.error.message,
    });
    return Err({
      error: appended.error,
      state: outcome,
      retry: async () => this.toMonitorResult(outcome, await this.log.append(outcome.event)),
    });
  }
}
