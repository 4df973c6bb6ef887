import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { unwrap } from '../../core/result.js';
import { readJsonFile, writeJsonAtomic } from '../atomic_file.js';
import { parseJsonLines } from '../safe_json.js';

describe('atomic JSON files', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'report-sentinel-files-'));
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('writes pretty JSON, creating parent directories, and leaves no temp file', async () => {
    const target = path.join(workspace, 'nested', 'doc.json');

    unwrap(await writeJsonAtomic(target, { a: 1 }));

    expect(await fs.readFile(target, 'utf8')).toBe('{\n  "a": 1\n}\n');
    expect(await fs.readdir(path.dirname(target))).toEqual(['doc.json']);
  });

  it('returns the fallback for a missing file', async () => {
    expect(unwrap(await readJsonFile(path.join(workspace, 'absent.json'), { empty: true }))).toEqual({ empty: true });
  });

  it('reports unparsable content as a non-retryable read error', async () => {
    const target = path.join(workspace, 'broken.json');
    await fs.writeFile(target, '{"a":');

    const result = await readJsonFile(target, {});

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.operation).toBe('read');
      expect(result.error.retryable).toBe(false);
    }
  });

  it('reports a write into a regular file as a write error', async () => {
    const blocker = path.join(workspace, 'blocker');
    await fs.writeFile(blocker, '');

    const result = await writeJsonAtomic(path.join(blocker, 'doc.json'), {});

    expect(result.ok).toBe(false);
    if (!result.ok) expect(result.error.operation).toBe('write');
  });
});

describe('parseJsonLines', () => {
  it('skips blank lines and reports invalid ones by line number', () => {
    expect(parseJsonLines('{"a":1}\n\nnot json\n{"b":2}\n')).toEqual({
      values: [{ a: 1 }, { b: 2 }],
      invalidLines: [3],
    });
  });
});
