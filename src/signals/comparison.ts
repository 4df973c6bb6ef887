/**
 * @fileoverview Cross-project comparison of deception scores
 */

import type { DeceptionScore, SignalKind, TrustTier } from './aggregator.js';

export interface ProjectStanding {
  readonly project: string;
  readonly trustScore: number;
  readonly indicators: readonly SignalKind[];
}

export interface CommonIssue {
  readonly count: number;
  /** Share of compared projects showing the indicator, 0-100 */
  readonly percentage: number;
}

export interface ProjectComparison {
  readonly totalProjects: number;
  readonly averageTrustScore: number;
  readonly projectsByTier: Readonly<Record<TrustTier, readonly ProjectStanding[]>>;
  /** Indicators raised by more than one project */
  readonly commonIssues: Readonly<Partial<Record<SignalKind, CommonIssue>>>;
}

export function compareProjects(scores: readonly DeceptionScore[]): ProjectComparison {
  const projectsByTier: Record<TrustTier, ProjectStanding[]> = { trusted: [], suspicious: [], deceptive: [] };
  const counts = new Map<SignalKind, number>();

  for (const score of scores) {
    const indicators = score.indicators.map((indicator) => indicator.kind);
    projectsByTier[score.tier].push({ project: score.project, trustScore: score.trustScore, indicators });
    for (const kind of new Set(indicators)) {
      counts.set(kind, (counts.get(kind) ?? 0) + 1);
    }
  }

  const commonIssues: Partial<Record<SignalKind, CommonIssue>> = {};
  for (const [kind, count] of counts) {
    if (count > 1) {
      commonIssues[kind] = { count, percentage: (count / scores.length) * 100 };
    }
  }

  const totalTrust = scores.reduce((sum, score) => sum + score.trustScore, 0);
  return {
    totalProjects: scores.length,
    averageTrustScore: scores.length > 0 ? totalTrust / scores.length : 0,
    projectsByTier,
    commonIssues,
  };
}
