import { describe, expect, it } from 'vitest';
import { unwrap } from '../../core/result.js';
import { parseTestRunReport } from '../../report/parse.js';
import { mixedReport, rawReport } from '../../test/fixtures.js';
import { computeDeceptionScore } from '../aggregator.js';
import { compareProjects } from '../comparison.js';
import { deriveReportSignals } from '../report_signals.js';

describe('deriveReportSignals', () => {
  it('counts passed cases that finished instantly', () => {
    const report = unwrap(
      parseTestRunReport(
        rawReport([
          { id: 'a', outcome: 'passed', duration: 0.001 },
          { id: 'b', outcome: 'passed', duration: 0.2 },
          { id: 'c', outcome: 'skipped', duration: 0 },
          { id: 'd', outcome: 'failed', duration: 0.005 },
        ]),
      ),
    );

    expect(deriveReportSignals(report)).toEqual({ instantTests: 1, instantTestRatio: 0.25, perfectSuite: false });
  });

  it('marks large suites without failures as perfect', () => {
    const eleven = unwrap(parseTestRunReport(mixedReport(11, 0)));
    const ten = unwrap(parseTestRunReport(mixedReport(10, 0)));

    expect(deriveReportSignals(eleven).perfectSuite).toBe(true);
    expect(deriveReportSignals(ten).perfectSuite).toBe(false);
    expect(deriveReportSignals(ten, { perfectSuiteMinTests: 5 }).perfectSuite).toBe(true);
  });

  it('is all zero for an empty run', () => {
    const empty = unwrap(parseTestRunReport({}));

    expect(deriveReportSignals(empty)).toEqual({ instantTests: 0, instantTestRatio: 0, perfectSuite: false });
  });
});

describe('compareProjects', () => {
  const base = {
    mockAbuseRatio: 0,
    skeletonRatio: 0,
    honeypotViolationRatio: 0,
    instantTestRatio: 0,
    hallucinationCount: 0,
    claimFailureCount: 0,
  };

  it('groups projects by tier and finds shared indicators', () => {
    const scores = [
      computeDeceptionScore('alpha', base),
      computeDeceptionScore('beta', { ...base, hallucinationCount: 2 }),
      computeDeceptionScore('gamma', { ...base, mockAbuseRatio: 1, skeletonRatio: 1, hallucinationCount: 10 }),
    ];

    const comparison = compareProjects(scores);

    expect(comparison.totalProjects).toBe(3);
    expect(comparison.projectsByTier.trusted.map((p) => p.project)).toEqual(['alpha', 'beta']);
    expect(comparison.projectsByTier.suspicious).toEqual([]);
    expect(comparison.projectsByTier.deceptive.map((p) => p.project)).toEqual(['gamma']);
    expect(comparison.commonIssues).toEqual({ hallucinations: { count: 2, percentage: (2 / 3) * 100 } });
    expect(comparison.averageTrustScore).toBeCloseTo((1 + 0.98 + 0.4) / 3, 10);
  });

  it('handles no projects', () => {
    expect(compareProjects([])).toEqual({
      totalProjects: 0,
      averageTrustScore: 0,
      projectsByTier: { trusted: [], suspicious: [], deceptive: [] },
      commonIssues: {},
    });
  });
});
