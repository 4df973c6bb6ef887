/**
 * @fileoverview Crash-safe file writes
 *
 * Writes go to a sibling temp file first and are renamed over the target, so a reader sees
 * either the old document or the new one, never a torn write.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { StorageError, getErrorMessage, toError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { safeJsonParse } from './safe_json.js';
import { logDebug } from '../telemetry/logger.js';

export async function writeFileAtomic(filePath: string, contents: string): Promise<Result<void, StorageError>> {
  const tempPath = `${filePath}.tmp.${process.pid}`;
  try {
    await fs.mkdir(path.dirname(filePath), { recursive: true });
    await fs.writeFile(tempPath, contents, 'utf8');
    await fs.rename(tempPath, filePath);
    return Ok(undefined);
  } catch (error) {
    try {
      await fs.rm(tempPath, { force: true });
    } catch (cleanupError) {
      logDebug('Failed to remove temp file after write failure', {
        path: tempPath,
        error: getErrorMessage(cleanupError),
      });
    }
    const cause = toError(error);
    return Err(new StorageError('write', filePath, cause.message, cause));
  }
}

export function writeJsonAtomic(filePath: string, value: unknown): Promise<Result<void, StorageError>> {
  return writeFileAtomic(filePath, JSON.stringify(value, null, 2) + '\n');
}

/**
 * Read a JSON document. A missing file is `fallback`; unreadable or unparsable content is a
 * `StorageError`, never silently replaced.
 */
export async function readJsonFile(filePath: string, fallback: unknown): Promise<Result<unknown, StorageError>> {
  let raw: string;
  try {
    raw = await fs.readFile(filePath, 'utf8');
  } catch (error) {
    const cause = toError(error);
    if (isMissingFile(error)) {
      return Ok(fallback);
    }
    return Err(new StorageError('read', filePath, cause.message, cause));
  }

  const parsed = safeJsonParse(raw);
  if (!parsed.ok) {
    return Err(new StorageError('read', filePath, `invalid JSON: ${parsed.error.message}`, parsed.error, false));
  }
  return Ok(parsed.value);
}

export function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}
