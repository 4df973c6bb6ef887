/**
 * @fileoverview Verification prompt and report
 *
 * Turns a record into the exact statements a faithful summary has to quote, a prompt that
 * hands those facts to a summarizer, and a report file carrying the same instructions.
 * The engine never calls a model itself; these are artifacts for whoever does.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import type { StorageError } from '../core/errors.js';
import { mapResult, type Result } from '../core/result.js';
import { writeJsonAtomic } from '../utils/atomic_file.js';
import type { RecordSnapshot } from './types.js';

/**
 * The literal success-rate string claims must quote: at least one decimal place, trailing
 * zeros beyond that dropped (`90` → `90.0`, `33.33` → `33.33`, `12.5` → `12.5`).
 */
export function formatSuccessRate(rate: number): string {
  return Number.isInteger(rate) ? rate.toFixed(1) : String(rate);
}

export function deploymentVerdict(record: RecordSnapshot): 'ALLOWED' | 'BLOCKED' {
  return record.facts.failed_count > 0 ? 'BLOCKED' : 'ALLOWED';
}

export function buildMandatoryStatements(record: RecordSnapshot): string[] {
  return [
    `${record.facts.failed_count} tests are failing`,
    `Success rate is ${formatSuccessRate(record.facts.exact_success_rate)}%`,
    `Deployment is ${deploymentVerdict(record)}`,
    `Hash: ${record.verification.hash}`,
  ];
}

export const FORBIDDEN_STATEMENTS: readonly string[] = [
  'Do not round success rates up',
  'Do not ignore failed tests',
  'Do not claim tests are passing if failed_count > 0',
  'Do not suggest deployment if any tests fail',
];

export interface DeploymentDecision {
  can_deploy: boolean;
  blocking_tests: number;
  required_actions: string[];
}

export function buildDeploymentDecision(record: RecordSnapshot): DeploymentDecision {
  const details = record.failed_case_details;
  return {
    can_deploy: record.facts.failed_count === 0,
    blocking_tests: details.length,
    required_actions:
      details.length > 0
        ? details.map((detail) => `Fix ${detail.name}`)
        : ['No actions required - all tests passing'],
  };
}

/**
 * Prompt text that hands the record's facts to a summarizer and states the rules its answer
 * is checked against.
 */
export function createVerificationPrompt(record: RecordSnapshot): string {
  const facts = record.facts;
  const verdict = deploymentVerdict(record);
  const rate = formatSuccessRate(facts.exact_success_rate);

  return [
    'You are analyzing test results. You MUST report these EXACT facts:',
    '',
    'IMMUTABLE TEST RESULTS:',
    '=======================',
    JSON.stringify(facts, null, 2),
    '',
    'FAILED TESTS REQUIRING FIXES:',
    JSON.stringify(record.failed_case_details, null, 2),
    '',
    'DEPLOYMENT DECISION:',
    JSON.stringify(buildDeploymentDecision(record), null, 2),
    '',
    `VERIFICATION HASH: ${record.verification.hash}`,
    '',
    'RULES:',
    `1. You MUST state that ${facts.failed_count} tests are failing`,
    `2. You MUST report the exact success rate: ${rate}%`,
    `3. You MUST state deployment is ${verdict}`,
    '4. Any deviation from these facts is a hallucination',
    '',
    'When responding:',
    '- Quote the exact numbers above',
    '- List all failed tests by name',
    '- State the deployment decision clearly',
    '- Include the verification hash in your response',
    '',
  ].join('\n');
}

export interface VerificationReport {
  facts: RecordSnapshot['facts'];
  failed_case_details: RecordSnapshot['failed_case_details'];
  verification: RecordSnapshot['verification'];
  deployment_decision: DeploymentDecision;
  llm_instructions: {
    mandatory_statements: string[];
    forbidden_statements: readonly string[];
  };
}

export function buildVerificationReport(record: RecordSnapshot): VerificationReport {
  return {
    facts: record.facts,
    failed_case_details: record.failed_case_details,
    verification: record.verification,
    deployment_decision: buildDeploymentDecision(record),
    llm_instructions: {
      mandatory_statements: buildMandatoryStatements(record),
      forbidden_statements: FORBIDDEN_STATEMENTS,
    },
  };
}

/**
 * Write the verification report atomically. Resolves to the absolute path written.
 */
export async function writeVerificationReport(
  record: RecordSnapshot,
  outputPath: string,
): Promise<Result<string, StorageError>> {
  const resolved = path.resolve(outputPath);
  return mapResult(await writeJsonAtomic(resolved, buildVerificationReport(record)), () => resolved);
}
