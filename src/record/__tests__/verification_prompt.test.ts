import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../../core/errors.js';
import { unwrap } from '../../core/result.js';
import { mixedReport, rawReport } from '../../test/fixtures.js';
import { buildImmutableRecord } from '../record_builder.js';
import {
  buildDeploymentDecision,
  buildMandatoryStatements,
  createVerificationPrompt,
  formatSuccessRate,
  writeVerificationReport,
} from '../verification_prompt.js';

describe('formatSuccessRate', () => {
  it('keeps one decimal on whole numbers', () => {
    expect(formatSuccessRate(90)).toBe('90.0');
    expect(formatSuccessRate(0)).toBe('0.0');
  });

  it('leaves fractional rates as they are', () => {
    expect(formatSuccessRate(33.33)).toBe('33.33');
    expect(formatSuccessRate(12.5)).toBe('12.5');
  });
});

describe('mandatory statements', () => {
  it('quotes the exact facts for a failing run', () => {
    const record = unwrap(buildImmutableRecord(mixedReport(45, 5)));

    expect(buildMandatoryStatements(record)).toEqual([
      '5 tests are failing',
      'Success rate is 90.0%',
      'Deployment is BLOCKED',
      `Hash: ${record.verification.hash}`,
    ]);
  });

  it('allows deployment for a clean run', () => {
    const record = unwrap(buildImmutableRecord(mixedReport(4, 0)));

    expect(buildMandatoryStatements(record)[2]).toBe('Deployment is ALLOWED');
    expect(buildDeploymentDecision(record)).toEqual({
      can_deploy: true,
      blocking_tests: 0,
      required_actions: ['No actions required - all tests passing'],
    });
  });
});

describe('createVerificationPrompt', () => {
  it('lists the rules with the exact figures', () => {
    const record = unwrap(
      buildImmutableRecord(
        rawReport([
          { id: 'x', outcome: 'passed' },
          { id: 'y', outcome: 'failed' },
          { id: 'z', outcome: 'passed' },
        ]),
      ),
    );

    const prompt = createVerificationPrompt(record);
    const lines = prompt.split('\n');

    expect(lines).toContain('1. You MUST state that 1 tests are failing');
    expect(lines).toContain('2. You MUST report the exact success rate: 66.67%');
    expect(lines).toContain('3. You MUST state deployment is BLOCKED');
    expect(lines).toContain(`VERIFICATION HASH: ${record.verification.hash}`);
    expect(prompt).toContain('"Fix y"');
  });
});

describe('writeVerificationReport', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'report-sentinel-prompt-'));
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('writes the record with instructions and returns the absolute path', async () => {
    const record = unwrap(buildImmutableRecord(mixedReport(2, 1)));
    const target = path.join(workspace, 'nested', 'verification.json');

    const written = unwrap(await writeVerificationReport(record, target));

    expect(written).toBe(path.resolve(target));
    const stored: unknown = JSON.parse(await fs.readFile(written, 'utf8'));
    expect(stored).toMatchObject({
      facts: { failed_count: 1, exact_success_rate: 66.67 },
      deployment_decision: {
        can_deploy: false,
        blocking_tests: 1,
        required_actions: ['Fix tests/test_bad.py::test_0'],
      },
      llm_instructions: {
        mandatory_statements: [
          '1 tests are failing',
          'Success rate is 66.67%',
          'Deployment is BLOCKED',
          `Hash: ${record.verification.hash}`,
        ],
      },
    });
    expect(await fs.readdir(path.dirname(written))).toEqual(['verification.json']);
  });

  it('returns a StorageError when the target cannot be written', async () => {
    const record = unwrap(buildImmutableRecord(mixedReport(1, 0)));
    const blocker = path.join(workspace, 'file');
    await fs.writeFile(blocker, 'not a directory');

    const result = await writeVerificationReport(record, path.join(blocker, 'report.json'));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StorageError);
      expect(result.error.operation).toBe('write');
    }
  });
});
