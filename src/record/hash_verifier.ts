/**
 * @fileoverview Binding-hash verification
 *
 * Recomputes the digest from the record's own facts and compares it with the stored hash.
 * Nothing else is consulted: a record is valid if and only if its facts still produce its hash.
 * Tampering is an expected outcome and is returned as a value, never thrown.
 */

import { z } from 'zod';
import { computeBindingHash, DEFAULT_RATE_PRECISION } from './canonical.js';
import { RECORD_ALGORITHM, type RecordSnapshot } from './types.js';

export interface VerifiedRecord {
  readonly valid: true;
  readonly hash: string;
}

export interface HashMismatch {
  readonly valid: false;
  readonly reason: 'hash_mismatch';
  readonly storedHash: string;
  readonly recomputedHash: string;
}

export interface MalformedRecord {
  readonly valid: false;
  readonly reason: 'malformed';
  readonly issues: string[];
}

export type RecordVerification = VerifiedRecord | HashMismatch | MalformedRecord;

export interface VerifyRecordOptions {
  /** Must match the precision the record was built with */
  precision?: number;
}

const nonNegativeInt = z.number().int().min(0);

export const RecordSnapshotSchema = z.object({
  facts: z.object({
    total_test_count: nonNegativeInt,
    passed_count: nonNegativeInt,
    failed_count: nonNegativeInt,
    skipped_count: nonNegativeInt,
    exact_success_rate: z.number().finite(),
    deployment_allowed: z.boolean(),
  }),
  failed_case_details: z.array(
    z.object({
      name: z.string(),
      error_category: z.string(),
    }),
  ),
  verification: z.object({
    version: z.string(),
    algorithm: z.literal(RECORD_ALGORITHM),
    hash: z.string().regex(/^[0-9a-f]{64}$/, 'expected a lowercase sha256 hex digest'),
    timestamp: z.string(),
  }),
});

export function verifyRecord(record: RecordSnapshot, options: VerifyRecordOptions = {}): RecordVerification {
  const recomputedHash = computeBindingHash(
    record.facts,
    record.failed_case_details,
    options.precision ?? DEFAULT_RATE_PRECISION,
  );
  if (recomputedHash === record.verification.hash) {
    return { valid: true, hash: recomputedHash };
  }
  return {
    valid: false,
    reason: 'hash_mismatch',
    storedHash: record.verification.hash,
    recomputedHash,
  };
}

/**
 * Verify a record that arrived as untyped JSON (read from disk, received from a collaborator).
 */
export function verifyRecordJson(value: unknown, options: VerifyRecordOptions = {}): RecordVerification {
  const parsed = RecordSnapshotSchema.safeParse(value);
  if (!parsed.success) {
    return {
      valid: false,
      reason: 'malformed',
      issues: parsed.error.issues.map((issue) => `${issue.path.join('.') || 'record'}: ${issue.message}`),
    };
  }
  return verifyRecord(parsed.data, options);
}

export function isHashMismatch(verification: RecordVerification): verification is HashMismatch {
  return !verification.valid && verification.reason === 'hash_mismatch';
}
