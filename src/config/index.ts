/**
 * @fileoverview report-sentinel configuration
 *
 * Every threshold, weight and path the engine uses lives here. Values come from (in order):
 * schema defaults, an optional YAML file, then `REPORT_SENTINEL_*` environment variables.
 *
 * Weights and tiers are tunable heuristics. The invariants enforced at load time are the ones
 * scoring depends on: non-negative weights summing to 1, and strictly ordered trust tiers.
 */

import * as fs from 'node:fs/promises';
import YAML from 'yaml';
import { z } from 'zod';
import { ConfigurationError, getErrorMessage } from '../core/errors.js';
import { isLogLevel } from '../telemetry/logger.js';

// ============================================================================
// DEFAULTS
// ============================================================================

export const DEFAULT_DEPLOYMENT_APPROVAL_PHRASES = [
  'can deploy',
  'ready to deploy',
  'deployment allowed',
  'safe to deploy',
  'okay to deploy',
  'ok to deploy',
  'good to deploy',
  'ready for deployment',
  'deployment approved',
  'ready to ship',
  'safe to ship',
] as const;

export const CONFIG_ENV_PREFIX = 'REPORT_SENTINEL_';

// ============================================================================
// SCHEMA
// ============================================================================

const ratio = z.number().min(0).max(1);

const SignalWeightsSchema = z
  .object({
    mockAbuse: ratio.default(0.25),
    skeleton: ratio.default(0.25),
    honeypotViolation: ratio.default(0.2),
    instantTest: ratio.default(0.15),
    hallucination: ratio.default(0.1),
    claimFailure: ratio.default(0.05),
  })
  .superRefine((weights, ctx) => {
    const total = Object.values(weights).reduce((sum, weight) => sum + weight, 0);
    if (Math.abs(total - 1) > 1e-9) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: `weights must sum to 1.0 (got ${total})`,
      });
    }
  });

const TrustTiersSchema = z
  .object({
    trusted: ratio.default(0.8),
    suspicious: ratio.default(0.5),
  })
  .refine((tiers) => tiers.suspicious < tiers.trusted, {
    message: 'tiers must be monotonic: suspicious < trusted',
  });

export const SentinelConfigSchema = z.object({
  logLevel: z
    .string()
    .refine(isLogLevel, { message: 'unknown log level' })
    .default('info'),
  record: z
    .object({
      precision: z.number().int().min(0).max(6).default(2),
      errorMessageLimit: z.number().int().positive().default(500),
    })
    .default({}),
  claims: z
    .object({
      discrepancyPenalty: z.number().positive().max(1).default(0.2),
      deploymentApprovalPhrases: z.array(z.string().min(1)).default([...DEFAULT_DEPLOYMENT_APPROVAL_PHRASES]),
      languagePatterns: z.boolean().default(false),
    })
    .default({}),
  signals: z
    .object({
      weights: SignalWeightsSchema.default({}),
      tiers: TrustTiersSchema.default({}),
      countSaturation: z.number().int().positive().default(10),
      indicatorRatioThreshold: ratio.default(0.3),
      instantTestSeconds: z.number().positive().default(0.01),
      perfectSuiteMinTests: z.number().int().min(0).default(10),
    })
    .default({}),
  flakiness: z
    .object({
      storageDir: z.string().min(1).default('.test_history'),
      window: z.number().int().min(3).default(20),
      minRuns: z.number().int().min(2).default(3),
      patternLength: z.number().int().positive().default(10),
      historyRetention: z.number().int().positive().default(100),
      trendDays: z.number().positive().default(7),
      healthDays: z.number().positive().default(30),
      regressionSampleSize: z.number().int().positive().default(5),
      regressionFactor: z.number().gt(1).default(1.5),
    })
    .refine((flakiness) => flakiness.window <= flakiness.historyRetention, {
      message: 'flakiness window cannot exceed history retention',
    })
    .default({}),
  monitoring: z
    .object({
      logDir: z.string().min(1).default('./logs'),
      alertThreshold: z.number().int().positive().default(5),
      enableAlerts: z.boolean().default(true),
      summaryIntervalMs: z.number().int().positive().default(60 * 60 * 1000),
    })
    .default({}),
});

export type SentinelConfig = z.infer<typeof SentinelConfigSchema>;
export type SentinelConfigInput = z.input<typeof SentinelConfigSchema>;
export type SignalWeights = SentinelConfig['signals']['weights'];
export type TrustTiers = SentinelConfig['signals']['tiers'];

// ============================================================================
// RESOLUTION
// ============================================================================

function describeIssues(error: z.ZodError): { key: string; message: string } {
  const first = error.issues[0];
  const key = first && first.path.length > 0 ? first.path.join('.') : 'config';
  const message = error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join('.') : 'config'}: ${issue.message}`)
    .join('; ');
  return { key, message };
}

/**
 * Validate a (partial) configuration and fill in defaults.
 *
 * @throws ConfigurationError listing every invalid field
 */
export function resolveConfig(input: SentinelConfigInput = {}): SentinelConfig {
  return parseConfig(input);
}

function parseConfig(input: unknown): SentinelConfig {
  const parsed = SentinelConfigSchema.safeParse(input);
  if (!parsed.success) {
    const { key, message } = describeIssues(parsed.error);
    throw new ConfigurationError(key, message);
  }
  return parsed.data;
}

export const DEFAULT_CONFIG: SentinelConfig = resolveConfig();

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(target: Record<string, unknown>, key: string): Record<string, unknown> {
  const existing = target[key];
  const created: Record<string, unknown> = isRecord(existing) ? { ...existing } : {};
  target[key] = created;
  return created;
}

function parseIntegerEnv(name: string, raw: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value)) {
    throw new ConfigurationError(name, `expected an integer, got "${raw}"`);
  }
  return value;
}

/**
 * Apply `REPORT_SENTINEL_*` overrides on top of a raw (unvalidated) config object.
 */
export function applyEnvOverrides(
  raw: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): Record<string, unknown> {
  const merged: Record<string, unknown> = { ...raw };
  const read = (suffix: string): string | undefined => {
    const value = env[`${CONFIG_ENV_PREFIX}${suffix}`];
    return value !== undefined && value.trim().length > 0 ? value : undefined;
  };

  const logLevel = read('LOG_LEVEL');
  if (logLevel) merged.logLevel = logLevel.trim().toLowerCase();

  const precision = read('PRECISION');
  if (precision) section(merged, 'record').precision = parseIntegerEnv(`${CONFIG_ENV_PREFIX}PRECISION`, precision);

  const storageDir = read('STORAGE_DIR');
  if (storageDir) section(merged, 'flakiness').storageDir = storageDir;

  const logDir = read('LOG_DIR');
  if (logDir) section(merged, 'monitoring').logDir = logDir;

  const threshold = read('ALERT_THRESHOLD');
  if (threshold) {
    section(merged, 'monitoring').alertThreshold = parseIntegerEnv(`${CONFIG_ENV_PREFIX}ALERT_THRESHOLD`, threshold);
  }

  return merged;
}

export interface LoadConfigOptions {
  /** YAML file; falls back to REPORT_SENTINEL_CONFIG when omitted */
  path?: string;
  env?: NodeJS.ProcessEnv;
}

/**
 * Load configuration from YAML plus environment overrides.
 *
 * @throws ConfigurationError when the file cannot be read or parsed, or values are invalid
 */
export async function loadConfig(options: LoadConfigOptions = {}): Promise<SentinelConfig> {
  const env = options.env ?? process.env;
  const filePath = options.path ?? env[`${CONFIG_ENV_PREFIX}CONFIG`];

  let fileConfig: Record<string, unknown> = {};
  if (filePath) {
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      throw new ConfigurationError(filePath, `cannot read config file: ${getErrorMessage(error)}`);
    }

    let parsed: unknown;
    try {
      parsed = YAML.parse(raw);
    } catch (error) {
      throw new ConfigurationError(filePath, `invalid YAML: ${getErrorMessage(error)}`);
    }

    if (parsed !== null && parsed !== undefined) {
      if (!isRecord(parsed)) {
        throw new ConfigurationError(filePath, 'top-level YAML value must be a mapping');
      }
      fileConfig = parsed;
    }
  }

  return parseConfig(applyEnvOverrides(fileConfig, env));
}
