/**
 * @fileoverview Test-run report parsing
 *
 * Accepts the JSON report shape produced by test runners (one object per run, a `tests` array
 * with one entry per executed case) and turns it into a validated, frozen `TestRunReport`.
 *
 * Unknown fields are dropped. A missing `tests` array is an empty run. Anything that cannot be
 * read as a well-formed case makes the whole report malformed.
 *
 * @packageDocumentation
 */

import { z } from 'zod';
import { MalformedReportError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { classifyError, DEFAULT_ERROR_MESSAGE_LIMIT, truncateErrorMessage } from './error_classifier.js';
import {
  TEST_OUTCOMES,
  type DeclaredCounts,
  type RunCounts,
  type TestCaseResult,
  type TestRunReport,
} from './types.js';

// ============================================================================
// INPUT SCHEMA
// ============================================================================

const OutcomeSchema = z
  .string()
  .transform((value) => value.trim().toLowerCase())
  .pipe(z.enum(TEST_OUTCOMES));

const DeclaredCountSchema = z.number().int().min(0).optional().catch(undefined);

export const RawTestCaseSchema = z
  .object({
    id: z.string().optional(),
    nodeid: z.string().optional(),
    name: z.string().optional(),
    outcome: OutcomeSchema.optional(),
    status: OutcomeSchema.optional(),
    duration: z.number().finite().min(0).optional(),
    error: z.string().nullable().optional(),
  })
  .superRefine((value, ctx) => {
    const id = value.id ?? value.nodeid ?? value.name;
    if (id === undefined || id.trim().length === 0) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['id'], message: 'test case needs a non-empty id' });
    }
    if (value.outcome === undefined && value.status === undefined) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['outcome'], message: 'test case needs an outcome' });
    }
  });

export const RawTestRunReportSchema = z.object({
  total: DeclaredCountSchema,
  passed: DeclaredCountSchema,
  failed: DeclaredCountSchema,
  skipped: DeclaredCountSchema,
  duration: z.number().finite().min(0).optional().catch(undefined),
  tests: z.array(RawTestCaseSchema).optional(),
});

export type RawTestRunReport = z.input<typeof RawTestRunReportSchema>;

// ============================================================================
// PARSING
// ============================================================================

export interface ParseReportOptions {
  errorMessageLimit?: number;
}

function formatIssue(issue: z.ZodIssue): string {
  const location = issue.path.length > 0 ? issue.path.join('.') : 'report';
  return `${location}: ${issue.message}`;
}

export function countOutcomes(cases: readonly TestCaseResult[]): RunCounts {
  let passed = 0;
  let failed = 0;
  let skipped = 0;
  let errored = 0;
  for (const testCase of cases) {
    switch (testCase.outcome) {
      case 'passed':
        passed += 1;
        break;
      case 'failed':
        failed += 1;
        break;
      case 'skipped':
        skipped += 1;
        break;
      case 'error':
        errored += 1;
        break;
    }
  }
  return { total: cases.length, passed, failed, skipped, errored };
}

function declaredMatches(declared: DeclaredCounts, counts: RunCounts): boolean {
  const pairs: Array<[number | undefined, number]> = [
    [declared.total, counts.total],
    [declared.passed, counts.passed],
    [declared.failed, counts.failed + counts.errored],
    [declared.skipped, counts.skipped],
  ];
  return pairs.every(([claimed, actual]) => claimed === undefined || claimed === actual);
}

/**
 * Parse a raw report into a `TestRunReport`, recomputing every aggregate from the cases.
 */
export function parseTestRunReport(
  input: unknown,
  options: ParseReportOptions = {},
): Result<TestRunReport, MalformedReportError> {
  if (typeof input !== 'object' || input === null || Array.isArray(input)) {
    return Err(new MalformedReportError(['report: expected a JSON object']));
  }

  const parsed = RawTestRunReportSchema.safeParse(input);
  if (!parsed.success) {
    return Err(new MalformedReportError(parsed.error.issues.map(formatIssue)));
  }

  const limit = options.errorMessageLimit ?? DEFAULT_ERROR_MESSAGE_LIMIT;
  const issues: string[] = [];
  const seen = new Set<string>();
  const cases: TestCaseResult[] = [];

  (parsed.data.tests ?? []).forEach((raw, index) => {
    // Both checked non-undefined by the case schema's refinement.
    const id = (raw.id ?? raw.nodeid ?? raw.name ?? '').trim();
    const outcome = raw.outcome ?? raw.status ?? 'error';
    if (seen.has(id)) {
      issues.push(`tests.${index}.id: duplicate test id "${id}"`);
      return;
    }
    seen.add(id);

    const message = raw.error ?? undefined;
    const testCase: TestCaseResult = Object.freeze({
      id,
      outcome,
      duration: raw.duration ?? 0,
      ...(message
        ? {
            error: Object.freeze({
              category: classifyError(message, limit),
              message: truncateErrorMessage(message, limit),
            }),
          }
        : {}),
    });
    cases.push(testCase);
  });

  if (issues.length > 0) {
    return Err(new MalformedReportError(issues));
  }

  const counts = Object.freeze(countOutcomes(cases));
  const declared: DeclaredCounts = Object.freeze({
    total: parsed.data.total,
    passed: parsed.data.passed,
    failed: parsed.data.failed,
    skipped: parsed.data.skipped,
  });
  const caseDuration = cases.reduce((sum, testCase) => sum + testCase.duration, 0);

  return Ok(
    Object.freeze({
      cases: Object.freeze(cases),
      counts,
      duration: parsed.data.duration ?? caseDuration,
      declared,
      countsConsistent: declaredMatches(declared, counts),
    }),
  );
}
