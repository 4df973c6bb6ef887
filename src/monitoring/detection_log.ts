/**
 * @fileoverview Append-only detection log
 *
 * One JSONL file per project under the log directory. Lines are only ever appended, and appends
 * for one project run one at a time so events land in the order they were recorded.
 *
 * @packageDocumentation
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import { z } from 'zod';
import { StorageError, toError } from '../core/errors.js';
import { Err, Ok, type Result } from '../core/result.js';
import { SEVERITIES } from '../core/severity.js';
import { logWarning } from '../telemetry/logger.js';
import { isMissingFile } from '../utils/atomic_file.js';
import { KeyedSerialQueue } from '../utils/keyed_queue.js';
import { parseJsonLines } from '../utils/safe_json.js';

export const DetectionSourceSchema = z.enum(['claim_check', 'deception_score', 'findings']);
export type DetectionSource = z.infer<typeof DetectionSourceSchema>;

export const DetectionEventSchema = z.object({
  timestamp: z.string(),
  project: z.string(),
  source: DetectionSourceSchema,
  hallucinationDetected: z.boolean(),
  maxSeverity: z.enum(SEVERITIES).nullable(),
  findings: z.array(
    z.object({
      kind: z.string(),
      severity: z.enum(SEVERITIES),
      detail: z.string().optional(),
    }),
  ),
  context: z.record(z.unknown()),
});

export type DetectionEvent = z.infer<typeof DetectionEventSchema>;

/** Characters outside this set are replaced in log file names. */
const UNSAFE_FILE_CHARS = /[^A-Za-z0-9._-]/g;

export function detectionLogPath(logDir: string, project: string): string {
  return path.join(logDir, `${project.replace(UNSAFE_FILE_CHARS, '_')}_hallucinations.jsonl`);
}

export class DetectionLog {
  private readonly queue = new KeyedSerialQueue();

  constructor(readonly logDir: string) {}

  append(event: DetectionEvent): Promise<Result<void, StorageError>> {
    const filePath = detectionLogPath(this.logDir, event.project);
    return this.queue.run(event.project, async () => {
      try {
        await fs.mkdir(this.logDir, { recursive: true });
        await fs.appendFile(filePath, JSON.stringify(event) + '\n', 'utf8');
        return Ok(undefined);
      } catch (error) {
        const cause = toError(error);
        return Err(new StorageError('append', filePath, cause.message, cause));
      }
    });
  }

  /**
   * Replay a project's events, oldest first. Lines that are not valid events (a torn final
   * append, hand edits) are skipped with a warning.
   */
  async read(project: string): Promise<Result<DetectionEvent[], StorageError>> {
    const filePath = detectionLogPath(this.logDir, project);
    let raw: string;
    try {
      raw = await fs.readFile(filePath, 'utf8');
    } catch (error) {
      if (isMissingFile(error)) return Ok([]);
      const cause = toError(error);
      return Err(new StorageError('read', filePath, cause.message, cause));
    }

    const { values, invalidLines } = parseJsonLines(raw);
    const events: DetectionEvent[] = [];
    let rejected = invalidLines.length;
    for (const value of values) {
      const parsed = DetectionEventSchema.safeParse(value);
      if (parsed.success) {
        // Sanitised names can collide; the file may hold another project's events.
        if (parsed.data.project === project) events.push(parsed.data);
      } else {
        rejected += 1;
      }
    }
    if (rejected > 0) {
      logWarning('Skipped unreadable detection log lines', { path: filePath, count: rejected });
    }
    return Ok(events);
  }
}
