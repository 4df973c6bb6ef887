/**
 * @fileoverview Safe JSON Parsing
 *
 * Utilities for parsing JSON and JSONL with error handling.
 *
 * @packageDocumentation
 */

import { Err, Ok, type Result } from '../core/result.js';

/**
 * Safely parse JSON, returning a Result with ok/value/error
 */
export function safeJsonParse(text: string): Result<unknown, Error> {
  try {
    return Ok(JSON.parse(text));
  } catch (e) {
    return Err(e instanceof Error ? e : new Error(String(e)));
  }
}

export interface JsonLinesParse {
  values: unknown[];
  /** 1-based line numbers that were not valid JSON */
  invalidLines: number[];
}

/**
 * Parse newline-delimited JSON. Blank lines are skipped; a torn trailing line (from a crash
 * mid-append) is reported in `invalidLines` instead of failing the whole file.
 */
export function parseJsonLines(text: string): JsonLinesParse {
  const values: unknown[] = [];
  const invalidLines: number[] = [];
  text.split('\n').forEach((line, index) => {
    if (line.trim().length === 0) return;
    const parsed = safeJsonParse(line);
    if (parsed.ok) {
      values.push(parsed.value);
    } else {
      invalidLines.push(index + 1);
    }
  });
  return { values, invalidLines };
}
