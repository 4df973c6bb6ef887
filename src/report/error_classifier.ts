import type { ErrorCategory } from './types.js';

export const DEFAULT_ERROR_MESSAGE_LIMIT = 500;

/**
 * Checked top to bottom; the first category with a matching marker wins.
 * Markers are compared case-insensitively as plain substrings.
 */
const CATEGORY_MARKERS: ReadonlyArray<{ category: ErrorCategory; markers: readonly string[] }> = [
  { category: 'assertion_failure', markers: ['assert', 'expect('] },
  { category: 'import_error', markers: ['importerror', 'modulenotfounderror', 'cannot find module'] },
  { category: 'timeout', markers: ['timeouterror', 'timed out', 'timeout'] },
  { category: 'connection_error', markers: ['connectionerror', 'econnrefused', 'econnreset', 'connection refused'] },
];

export function truncateErrorMessage(message: string, limit = DEFAULT_ERROR_MESSAGE_LIMIT): string {
  return message.length > limit ? message.slice(0, limit) : message;
}

export function classifyError(message: string | undefined, limit = DEFAULT_ERROR_MESSAGE_LIMIT): ErrorCategory {
  if (!message) return 'unknown_error';
  const haystack = truncateErrorMessage(message, limit).toLowerCase();
  for (const { category, markers } of CATEGORY_MARKERS) {
    if (markers.some((marker) => haystack.includes(marker))) {
      return category;
    }
  }
  return 'unknown_error';
}
