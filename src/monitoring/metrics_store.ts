/**
 * @fileoverview Per-project detection counters
 *
 * One store per process (or per test), handed to the AlertMonitor that owns it. Severity and
 * pattern breakdowns are cumulative; only `hallucinationsDetected` is ever reset, by the monitor
 * after an alert fires.
 *
 * @packageDocumentation
 */

import type { Severity } from '../core/severity.js';

export interface Finding {
  /** Discrepancy or signal kind, counted in the pattern breakdown */
  readonly kind: string;
  readonly severity: Severity;
  readonly detail?: string;
}

export interface ProjectMetrics {
  readonly totalChecks: number;
  readonly hallucinationsDetected: number;
  readonly severityBreakdown: Readonly<Record<Severity, number>>;
  readonly patternBreakdown: Readonly<Record<string, number>>;
}

interface Counters {
  totalChecks: number;
  hallucinationsDetected: number;
  severityBreakdown: Record<Severity, number>;
  patternBreakdown: Map<string, number>;
}

function snapshot(counters: Counters): ProjectMetrics {
  return Object.freeze({
    totalChecks: counters.totalChecks,
    hallucinationsDetected: counters.hallucinationsDetected,
    severityBreakdown: Object.freeze({ ...counters.severityBreakdown }),
    patternBreakdown: Object.freeze(Object.fromEntries(counters.patternBreakdown)),
  });
}

export class ProjectMetricsStore {
  private readonly counters = new Map<string, Counters>();

  /**
   * Count one check. A check with findings also counts as a detection.
   * Returns the metrics after the update.
   */
  recordCheck(project: string, findings: readonly Finding[]): ProjectMetrics {
    const counters = this.countersFor(project);
    counters.totalChecks += 1;
    if (findings.length > 0) {
      counters.hallucinationsDetected += 1;
      for (const finding of findings) {
        counters.severityBreakdown[finding.severity] += 1;
        counters.patternBreakdown.set(finding.kind, (counters.patternBreakdown.get(finding.kind) ?? 0) + 1);
      }
    }
    return snapshot(counters);
  }

  resetDetections(project: string): void {
    const counters = this.counters.get(project);
    if (counters) counters.hallucinationsDetected = 0;
  }

  get(project: string): ProjectMetrics | undefined {
    const counters = this.counters.get(project);
    return counters ? snapshot(counters) : undefined;
  }

  all(): Record<string, ProjectMetrics> {
    const result: Record<string, ProjectMetrics> = {};
    for (const [project, counters] of this.counters) {
      result[project] = snapshot(counters);
    }
    return result;
  }

  projects(): string[] {
    return Array.from(this.counters.keys());
  }

  private countersFor(project: string): Counters {
    let counters = this.counters.get(project);
    if (!counters) {
      counters = {
        totalChecks: 0,
        hallucinationsDetected: 0,
        severityBreakdown: { low: 0, medium: 0, high: 0, critical: 0 },
        patternBreakdown: new Map(),
      };
      this.counters.set(project, counters);
    }
    return counters;
  }
}
