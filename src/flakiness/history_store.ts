/**
 * @fileoverview Run history persistence
 *
 * Two documents per store: `test_history.json` (retained runs per project) and
 * `flaky_tests.json` (latest flaky analysis per project). Each save re-reads both documents,
 * replaces the saving project's entry and writes them back with temp-file-then-rename, so a
 * crash leaves either the previous or the new document on disk.
 *
 * Saves are chained inside the process and guarded by a lock file across processes.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import lockfile from 'proper-lockfile';
import type { z } from 'zod';
import { StorageError, toError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { logWarning } from '../telemetry/logger.js';
import { readJsonFile, writeJsonAtomic } from '../utils/atomic_file.js';
import {
  FlakyDocumentSchema,
  HistoryDocumentSchema,
  type FlakyDocument,
  type FlakyProjectEntry,
  type HistoryDocument,
  type RunRecord,
} from './types.js';

export const HISTORY_FILE = 'test_history.json';
export const FLAKY_FILE = 'flaky_tests.json';
const LOCK_FILE = '.history.lock';

const LOCK_STALE_TIMEOUT_MS = 60_000;
const LOCK_MAX_RETRIES = 10;

export interface HistoryStore {
  /** Where the store keeps its data, for messages */
  readonly location: string;
  loadRuns(project: string): Promise<Result<RunRecord[], StorageError>>;
  loadFlaky(): Promise<Result<FlakyDocument, StorageError>>;
  saveProject(project: string, runs: readonly RunRecord[], flaky: FlakyProjectEntry): Promise<Result<void, StorageError>>;
}

// ============================================================================
// FILE STORE
// ============================================================================

export interface JsonFileHistoryStoreOptions {
  lockStaleMs?: number;
  lockRetries?: number;
}

export class JsonFileHistoryStore implements HistoryStore {
  readonly historyPath: string;
  readonly flakyPath: string;
  private readonly lockPath: string;
  private saveChain: Promise<void> = Promise.resolve();

  constructor(
    readonly location: string,
    private readonly options: JsonFileHistoryStoreOptions = {},
  ) {
    this.historyPath = path.join(location, HISTORY_FILE);
    this.flakyPath = path.join(location, FLAKY_FILE);
    this.lockPath = path.join(location, LOCK_FILE);
  }

  async loadRuns(project: string): Promise<Result<RunRecord[], StorageError>> {
    const history = await this.readDocument(this.historyPath, HistoryDocumentSchema);
    if (!history.ok) return history;
    return Ok(history.value[project] ?? []);
  }

  loadFlaky(): Promise<Result<FlakyDocument, StorageError>> {
    return this.readDocument(this.flakyPath, FlakyDocumentSchema);
  }

  saveProject(
    project: string,
    runs: readonly RunRecord[],
    flaky: FlakyProjectEntry,
  ): Promise<Result<void, StorageError>> {
    const run = this.saveChain.then(() =>
      this.withLock(async () => {
        const history = await this.readDocument(this.historyPath, HistoryDocumentSchema);
        if (!history.ok) return history;
        const nextHistory: HistoryDocument = { ...history.value, [project]: [...runs] };
        const historyWrite = await writeJsonAtomic(this.historyPath, nextHistory);
        if (!historyWrite.ok) return historyWrite;

        const flakyDocument = await this.readDocument(this.flakyPath, FlakyDocumentSchema);
        if (!flakyDocument.ok) return flakyDocument;
        const nextFlaky: FlakyDocument = { ...flakyDocument.value, [project]: flaky };
        return writeJsonAtomic(this.flakyPath, nextFlaky);
      }),
    );
    this.saveChain = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private async readDocument<T>(filePath: string, schema: z.ZodType<T>): Promise<Result<T, StorageError>> {
    const raw = await readJsonFile(filePath, {});
    if (!raw.ok) return raw;
    const parsed = schema.safeParse(raw.value);
    if (!parsed.success) {
      const issue = parsed.error.issues[0];
      const where = issue && issue.path.length > 0 ? ` at ${issue.path.join('.')}` : '';
      return Err(new StorageError('read', filePath, `unexpected document shape${where}`, undefined, false));
    }
    return Ok(parsed.data);
  }

  private async withLock(
    task: () => Promise<Result<void, StorageError>>,
  ): Promise<Result<void, StorageError>> {
    let release: () => Promise<void>;
    try {
      await fs.mkdir(this.location, { recursive: true });
      release = await lockfile.lock(this.location, {
        lockfilePath: this.lockPath,
        stale: this.options.lockStaleMs ?? LOCK_STALE_TIMEOUT_MS,
        retries: {
          retries: this.options.lockRetries ?? LOCK_MAX_RETRIES,
          factor: 1.5,
          minTimeout: 50,
          maxTimeout: 2_000,
        },
        onCompromised: (err) => {
          logWarning('History lock compromised', { path: this.lockPath, error: toError(err).message });
        },
      });
    } catch (error) {
      const cause = toError(error);
      return Err(new StorageError('lock', this.lockPath, cause.message, cause));
    }

    try {
      return await task();
    } finally {
      try {
        await release();
      } catch (releaseError) {
        logWarning('Failed to release history lock', { path: this.lockPath, error: toError(releaseError).message });
      }
    }
  }
}

// ============================================================================
// IN-MEMORY STORE
// ============================================================================

/**
 * Keeps both documents in memory. For tests and for callers that persist elsewhere.
 */
export class InMemoryHistoryStore implements HistoryStore {
  readonly location = 'memory';
  private history: HistoryDocument = {};
  private flaky: FlakyDocument = {};

  async loadRuns(project: string): Promise<Result<RunRecord[], StorageError>> {
    return Ok(structuredClone(this.history[project] ?? []));
  }

  async loadFlaky(): Promise<Result<FlakyDocument, StorageError>> {
    return Ok(structuredClone(this.flaky));
  }

  async saveProject(
    project: string,
    runs: readonly RunRecord[],
    flaky: FlakyProjectEntry,
  ): Promise<Result<void, StorageError>> {
    this.history = { ...this.history, [project]: structuredClone([...runs]) };
    this.flaky = { ...this.flaky, [project]: structuredClone(flaky) };
    return Ok(undefined);
  }
}
