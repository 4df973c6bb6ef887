/**
 * @fileoverview Flakiness history types and on-disk schemas
 *
 * Documents read back from disk are validated before use; a file that does not match is a
 * read failure, not an empty history.
 */

import { z } from 'zod';
import { TEST_OUTCOMES, type TestOutcome } from '../report/types.js';

export const OutcomeLetterSchema = z.enum(['P', 'F', 'S']);
export type OutcomeLetter = z.infer<typeof OutcomeLetterSchema>;

export const RunTestEntrySchema = z.object({
  outcome: z.enum(TEST_OUTCOMES),
  duration: z.number().min(0),
  error: z.string().nullable(),
});

export const RunRecordSchema = z.object({
  runId: z.string(),
  /** ISO-8601 ingestion time */
  timestamp: z.string(),
  summary: z.object({
    total: z.number().int().min(0),
    passed: z.number().int().min(0),
    failed: z.number().int().min(0),
    skipped: z.number().int().min(0),
    errored: z.number().int().min(0),
    duration: z.number().min(0),
  }),
  tests: z.record(RunTestEntrySchema),
});

export type RunTestEntry = z.infer<typeof RunTestEntrySchema>;
export type RunRecord = z.infer<typeof RunRecordSchema>;

/** `test_history.json`: project name → retained runs, oldest first */
export const HistoryDocumentSchema = z.record(z.array(RunRecordSchema));
export type HistoryDocument = z.infer<typeof HistoryDocumentSchema>;

export const FlakyTestEntrySchema = z.object({
  testId: z.string(),
  /** 0 when all outcomes agree, 1 at an even pass/fail split */
  flakinessScore: z.number().min(0).max(1),
  /** Percentages rounded to one decimal */
  passRate: z.number(),
  failRate: z.number(),
  totalRuns: z.number().int().min(0),
  /** Most recent outcomes, oldest first */
  recentPattern: z.string(),
  lastOutcome: z.enum(TEST_OUTCOMES),
  detectedAt: z.string(),
});

export type FlakyTestEntry = z.infer<typeof FlakyTestEntrySchema>;

export const FlakyProjectEntrySchema = z.object({
  updatedAt: z.string(),
  tests: z.record(FlakyTestEntrySchema),
});

export type FlakyProjectEntry = z.infer<typeof FlakyProjectEntrySchema>;

/** `flaky_tests.json`: project name → latest flaky analysis */
export const FlakyDocumentSchema = z.record(FlakyProjectEntrySchema);
export type FlakyDocument = z.infer<typeof FlakyDocumentSchema>;

export function outcomeLetter(outcome: TestOutcome): OutcomeLetter {
  if (outcome === 'passed') return 'P';
  if (outcome === 'failed') return 'F';
  return 'S';
}
