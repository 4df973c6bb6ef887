/**
 * @fileoverview report-sentinel
 *
 * Tamper-evident records of test runs, and checks that hold claims about those runs to the
 * recorded facts.
 *
 * ## Quick Start
 *
 * ```typescript
 * import { createTrustEngine, loadConfig } from 'report-sentinel';
 *
 * const engine = createTrustEngine(await loadConfig());
 *
 * const result = await engine.verifyClaim('web', report, summaryFromAgent);
 * if (result.ok && !result.value.detection.verified) {
 *   console.error(result.value.detection.discrepancies);
 * }
 * ```
 *
 * @packageDocumentation
 */

// ============================================================================
// ENGINE
// ============================================================================

export * from './engine.js';
export * from './config/index.js';

// ============================================================================
// RECORDS
// ============================================================================

export * from './report/types.js';
export * from './report/parse.js';
export * from './report/error_classifier.js';
export * from './record/types.js';
export * from './record/canonical.js';
export * from './record/record_builder.js';
export * from './record/hash_verifier.js';
export * from './record/verification_prompt.js';

// ============================================================================
// CLAIMS AND SIGNALS
// ============================================================================

export * from './claims/claim_checker.js';
export * from './signals/aggregator.js';
export * from './signals/report_signals.js';
export * from './signals/comparison.js';

// ============================================================================
// FLAKINESS
// ============================================================================

export * from './flakiness/types.js';
export * from './flakiness/outcome_window.js';
export * from './flakiness/flaky_analysis.js';
export * from './flakiness/trends.js';
export * from './flakiness/history_store.js';
export * from './flakiness/tracker.js';

// ============================================================================
// MONITORING
// ============================================================================

export * from './monitoring/metrics_store.js';
export * from './monitoring/detection_log.js';
export * from './monitoring/alert_monitor.js';

// ============================================================================
// SHARED
// ============================================================================

export * from './core/errors.js';
export * from './core/result.js';
export type { PersistenceFailure } from './core/persistence.js';
export * from './core/severity.js';
export { logDebug, logError, logInfo, logWarning, setLogLevel, getLogLevel, isLogLevel } from './telemetry/logger.js';
export type { LogContext, LogLevel } from './telemetry/logger.js';
