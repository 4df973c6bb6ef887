/**
 * Centralized Vitest setup.
 *
 * Library code logs to stderr. Unit runs silence it unless REPORT_SENTINEL_TEST_VERBOSE=true;
 * suites that assert on logging raise the level themselves.
 */

import { afterEach, beforeEach } from 'vitest';
import { setLogLevel } from './src/telemetry/logger.js';

const verbose = process.env.REPORT_SENTINEL_TEST_VERBOSE === 'true';

beforeEach(() => {
  setLogLevel(verbose ? 'debug' : 'silent');
});

afterEach(() => {
  setLogLevel(verbose ? 'debug' : 'silent');
});
