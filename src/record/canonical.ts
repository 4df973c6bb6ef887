/**
 * @fileoverview Canonical serialization and binding hash
 *
 * Two implementations given the same facts must feed byte-identical input to the digest:
 * - object keys in binary (code unit) order, arrays in their given order
 * - integers without a fractional part
 * - the success rate with exactly `precision` decimals, or its full digits when it carries more
 * - no whitespace
 *
 * Only `facts` and `failed_case_details` are hashed; the verification block is excluded.
 */

import { createHash } from 'node:crypto';
import type { RecordFacts, RecordSnapshot } from './types.js';

export const DEFAULT_RATE_PRECISION = 2;

/**
 * A number that serializes with a fixed count of decimals. A value with more decimals than that
 * keeps all of them, so it can never share a serialization with its rounded neighbour.
 */
export class FixedDecimal {
  constructor(
    readonly value: number,
    readonly digits: number,
  ) {}

  toCanonical(): string {
    const fixed = this.value.toFixed(this.digits);
    return Number(fixed) === this.value ? fixed : String(this.value);
  }
}

export type CanonicalValue =
  | null
  | boolean
  | number
  | string
  | FixedDecimal
  | readonly CanonicalValue[]
  | { readonly [key: string]: CanonicalValue };

function compareBinary(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function isCanonicalArray(value: CanonicalValue): value is readonly CanonicalValue[] {
  return Array.isArray(value);
}

export function canonicalStringify(value: CanonicalValue): string {
  if (value === null) return 'null';
  if (typeof value === 'boolean') return String(value);
  if (typeof value === 'number') return Number.isFinite(value) ? String(value) : 'null';
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof FixedDecimal) return value.toCanonical();
  if (isCanonicalArray(value)) {
    return '[' + value.map((item) => canonicalStringify(item)).join(',') + ']';
  }
  const keys = Object.keys(value).sort(compareBinary);
  return '{' + keys.map((key) => JSON.stringify(key) + ':' + canonicalStringify(value[key])).join(',') + '}';
}

/**
 * The exact bytes (as a string) the binding hash is computed over.
 */
export function serializeForBinding(
  facts: RecordFacts,
  failedCaseDetails: RecordSnapshot['failed_case_details'],
  precision = DEFAULT_RATE_PRECISION,
): string {
  return canonicalStringify({
    facts: {
      total_test_count: facts.total_test_count,
      passed_count: facts.passed_count,
      failed_count: facts.failed_count,
      skipped_count: facts.skipped_count,
      exact_success_rate: new FixedDecimal(facts.exact_success_rate, precision),
      deployment_allowed: facts.deployment_allowed,
    },
    failed_case_details: failedCaseDetails.map((detail) => ({
      name: detail.name,
      error_category: detail.error_category,
    })),
  });
}

export function computeBindingHash(
  facts: RecordFacts,
  failedCaseDetails: RecordSnapshot['failed_case_details'],
  precision = DEFAULT_RATE_PRECISION,
): string {
  return createHash('sha256').update(serializeForBinding(facts, failedCaseDetails, precision), 'utf8').digest('hex');
}
