/**
 * @fileoverview Signal aggregation
 *
 * Combines one project's heuristic signals into a deception score:
 *
 *   overall = Σ weight(kind) × normalized(kind)
 *
 * Ratios are used as given; counts are normalized as min(count / saturation, 1) so a large
 * count can never contribute more than its weight. With non-negative weights this makes the
 * score monotonic in every signal.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { ValidationError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import type { Severity } from '../core/severity.js';
import { DEFAULT_CONFIG, type SignalWeights, type TrustTiers } from '../config/index.js';

// ============================================================================
// SIGNAL CONTRACT
// ============================================================================

const ratio = z.number().finite().min(0).max(1);
const count = z.number().int().min(0);

/**
 * Produced by whatever structural analysis runs against the project. Missing signals are 0.
 */
export const SignalBundleSchema = z.object({
  mockAbuseRatio: ratio.default(0),
  skeletonRatio: ratio.default(0),
  honeypotViolationRatio: ratio.default(0),
  instantTestRatio: ratio.default(0),
  hallucinationCount: count.default(0),
  claimFailureCount: count.default(0),
});

export type SignalBundle = z.infer<typeof SignalBundleSchema>;
export type SignalBundleInput = z.input<typeof SignalBundleSchema>;

export function parseSignalBundle(input: unknown): Result<SignalBundle, ValidationError> {
  const parsed = SignalBundleSchema.safeParse(input ?? {});
  if (parsed.success) {
    return Ok(parsed.data);
  }
  const issue = parsed.error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : 'signals';
  return Err(new ValidationError(field, issue?.message ?? 'a valid signal bundle', JSON.stringify(input)));
}

export type SignalKind =
  | 'mock_abuse'
  | 'skeleton_code'
  | 'honeypot_violation'
  | 'instant_tests'
  | 'hallucinations'
  | 'claim_failures';

interface SignalDefinition {
  kind: SignalKind;
  field: keyof SignalBundle;
  weight: keyof SignalWeights;
  scale: 'ratio' | 'count';
  severity: Severity;
  /** Flag any non-zero value regardless of the ratio threshold */
  flagAnyNonZero: boolean;
}

const SIGNAL_DEFINITIONS: readonly SignalDefinition[] = [
  { kind: 'mock_abuse', field: 'mockAbuseRatio', weight: 'mockAbuse', scale: 'ratio', severity: 'critical', flagAnyNonZero: false },
  { kind: 'skeleton_code', field: 'skeletonRatio', weight: 'skeleton', scale: 'ratio', severity: 'high', flagAnyNonZero: false },
  {
    kind: 'honeypot_violation',
    field: 'honeypotViolationRatio',
    weight: 'honeypotViolation',
    scale: 'ratio',
    severity: 'critical',
    flagAnyNonZero: true,
  },
  { kind: 'instant_tests', field: 'instantTestRatio', weight: 'instantTest', scale: 'ratio', severity: 'high', flagAnyNonZero: false },
  { kind: 'hallucinations', field: 'hallucinationCount', weight: 'hallucination', scale: 'count', severity: 'high', flagAnyNonZero: true },
  { kind: 'claim_failures', field: 'claimFailureCount', weight: 'claimFailure', scale: 'count', severity: 'medium', flagAnyNonZero: true },
];

// ============================================================================
// SCORE TYPES
// ============================================================================

export type TrustTier = 'trusted' | 'suspicious' | 'deceptive';

export interface SignalContribution {
  readonly kind: SignalKind;
  readonly raw: number;
  readonly normalized: number;
  readonly weight: number;
  readonly contribution: number;
}

export interface DeceptionIndicator {
  readonly kind: SignalKind;
  readonly severity: Severity;
  readonly value: number;
}

export interface DeceptionScore {
  readonly project: string;
  readonly overallDeceptionScore: number;
  readonly trustScore: number;
  readonly tier: TrustTier;
  readonly contributions: readonly SignalContribution[];
  readonly indicators: readonly DeceptionIndicator[];
  readonly createdAt: string;
}

export interface AggregatorOptions {
  weights?: SignalWeights;
  tiers?: TrustTiers;
  /** Count at which a count signal reaches its full weight */
  countSaturation?: number;
  /** A ratio signal above this is reported as an indicator */
  indicatorRatioThreshold?: number;
  now?: () => Date;
}

// ============================================================================
// AGGREGATION
// ============================================================================

function clamp01(value: number): number {
  if (!Number.isFinite(value)) return value > 0 ? 1 : 0;
  return Math.min(1, Math.max(0, value));
}

export function normalizeSignal(scale: 'ratio' | 'count', raw: number, countSaturation: number): number {
  return scale === 'ratio' ? clamp01(raw) : clamp01(raw / countSaturation);
}

/**
 * Tier for a trust score. Thresholds are inclusive lower bounds.
 */
export function classifyTrust(trustScore: number, tiers: TrustTiers = DEFAULT_CONFIG.signals.tiers): TrustTier {
  if (trustScore >= tiers.trusted) return 'trusted';
  if (trustScore >= tiers.suspicious) return 'suspicious';
  return 'deceptive';
}

export function computeDeceptionScore(
  project: string,
  signals: SignalBundle,
  options: AggregatorOptions = {},
): DeceptionScore {
  const defaults = DEFAULT_CONFIG.signals;
  const weights = options.weights ?? defaults.weights;
  const saturation = options.countSaturation ?? defaults.countSaturation;
  const threshold = options.indicatorRatioThreshold ?? defaults.indicatorRatioThreshold;
  const now = options.now ?? (() => new Date());

  const contributions: SignalContribution[] = [];
  const indicators: DeceptionIndicator[] = [];

  for (const definition of SIGNAL_DEFINITIONS) {
    const raw = signals[definition.field];
    const normalized = normalizeSignal(definition.scale, raw, saturation);
    const weight = weights[definition.weight];
    contributions.push(Object.freeze({ kind: definition.kind, raw, normalized, weight, contribution: weight * normalized }));

    const flagged = definition.flagAnyNonZero ? normalized > 0 : normalized > threshold;
    if (flagged) {
      indicators.push(Object.freeze({ kind: definition.kind, severity: definition.severity, value: raw }));
    }
  }

  const overall = clamp01(contributions.reduce((sum, item) => sum + item.contribution, 0));
  const trustScore = clamp01(1 - overall);

  return Object.freeze({
    project,
    overallDeceptionScore: overall,
    trustScore,
    tier: classifyTrust(trustScore, options.tiers ?? defaults.tiers),
    contributions: Object.freeze(contributions),
    indicators: Object.freeze(indicators),
    createdAt: now().toISOString(),
  });
}

// ============================================================================
// RECOMMENDATIONS
// ============================================================================

const RECOMMENDATIONS: Record<SignalKind, string> = {
  mock_abuse: 'CRITICAL: Remove mocks from integration tests so they exercise real components',
  skeleton_code: 'Implement real functionality in functions that only contain placeholders',
  honeypot_violation: 'CRITICAL: Restore honeypot tests to their failing state; they are designed to fail',
  instant_tests: 'Investigate tests that finish instantly; they are likely mocked or not executed',
  hallucinations: 'Remove or implement features that are claimed but do not exist',
  claim_failures: 'Correct documentation claims that the implementation does not support',
};

export function recommendationsFor(score: DeceptionScore): string[] {
  const recommendations = score.indicators.map((indicator) => RECOMMENDATIONS[indicator.kind]);
  if (score.tier === 'deceptive') {
    recommendations.unshift('LOW TRUST SCORE: this project shows significant signs of deception');
  }
  return recommendations;
}
