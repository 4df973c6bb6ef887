/**
 * @fileoverview Immutable record wire types
 *
 * Field names follow the published JSON schema (snake_case) so a record can be written,
 * shipped to another process and re-verified without a mapping layer.
 */

import type { ErrorCategory } from '../report/types.js';

export const RECORD_VERSION = '1.0';
export const RECORD_ALGORITHM = 'sha256';

export interface RecordFacts {
  readonly total_test_count: number;
  readonly passed_count: number;
  /** Failed plus errored cases */
  readonly failed_count: number;
  readonly skipped_count: number;
  /** Percentage rounded to the configured precision */
  readonly exact_success_rate: number;
  readonly deployment_allowed: boolean;
}

export interface FailedCaseDetail {
  readonly name: string;
  readonly error_category: ErrorCategory;
}

export interface RecordVerificationBlock {
  readonly version: typeof RECORD_VERSION;
  readonly algorithm: typeof RECORD_ALGORITHM;
  readonly hash: string;
  /** ISO-8601 creation time; not covered by the hash */
  readonly timestamp: string;
}

export interface ImmutableRecord {
  readonly facts: RecordFacts;
  readonly failed_case_details: readonly FailedCaseDetail[];
  readonly verification: RecordVerificationBlock;
}

/**
 * Structural view of a record that may have come from outside (a file, another service).
 * Every built `ImmutableRecord` satisfies it; categories and version are plain strings here
 * because a tampered record can carry anything.
 */
export interface RecordSnapshot {
  readonly facts: RecordFacts;
  readonly failed_case_details: ReadonlyArray<{ readonly name: string; readonly error_category: string }>;
  readonly verification: {
    readonly version: string;
    readonly algorithm: string;
    readonly hash: string;
    readonly timestamp: string;
  };
}
