import * as fs from 'node:fs/promises';
import * as os from 'node:os';
import * as path from 'node:path';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { StorageError } from '../../core/errors.js';
import { Err, unwrap, type Result } from '../../core/result.js';
import { parseTestRunReport } from '../../report/parse.js';
import type { TestOutcome, TestRunReport } from '../../report/types.js';
import { rawReport } from '../../test/fixtures.js';
import { FLAKY_FILE, HISTORY_FILE, InMemoryHistoryStore, JsonFileHistoryStore, type HistoryStore } from '../history_store.js';
import { FlakinessTracker, type RunIngestion } from '../tracker.js';
import type { FlakyDocument, FlakyProjectEntry, RunRecord } from '../types.js';

const DAY_MS = 24 * 60 * 60 * 1000;

function report(outcomes: Record<string, TestOutcome>, duration = 0.5): TestRunReport {
  return unwrap(
    parseTestRunReport(rawReport(Object.entries(outcomes).map(([id, outcome]) => ({ id, outcome, duration })))),
  );
}

function steppingClock(start: string, stepMs: number): () => Date {
  let current = Date.parse(start) - stepMs;
  return () => {
    current += stepMs;
    return new Date(current);
  };
}

/** Fails the next `failures` saves, then behaves like the in-memory store. */
class FailingSaveStore implements HistoryStore {
  readonly location = 'failing';
  private readonly inner = new InMemoryHistoryStore();
  saves = 0;

  constructor(private failures: number) {}

  loadRuns(project: string): Promise<Result<RunRecord[], StorageError>> {
    return this.inner.loadRuns(project);
  }

  loadFlaky(): Promise<Result<FlakyDocument, StorageError>> {
    return this.inner.loadFlaky();
  }

  async saveProject(
    project: string,
    runs: readonly RunRecord[],
    flaky: FlakyProjectEntry,
  ): Promise<Result<void, StorageError>> {
    this.saves += 1;
    if (this.failures > 0) {
      this.failures -= 1;
      return Err(new StorageError('write', 'failing/test_history.json', 'disk full'));
    }
    return this.inner.saveProject(project, runs, flaky);
  }
}

describe('FlakinessTracker', () => {
  it('flags a test that alternates between passing and failing', async () => {
    const tracker = new FlakinessTracker(new InMemoryHistoryStore(), { now: () => new Date('2026-03-01T00:00:00Z') });
    let last: RunIngestion | undefined;
    for (let i = 0; i < 10; i += 1) {
      last = unwrap(await tracker.ingestRun('web', report({ flip: i % 2 === 0 ? 'passed' : 'failed', steady: 'passed' })));
    }

    expect(last?.retainedRuns).toBe(10);
    expect(last?.flakyTests).toHaveLength(1);
    expect(last?.flakyTests[0]).toMatchObject({
      testId: 'flip',
      flakinessScore: 1,
      recentPattern: 'PFPFPFPFPF',
      lastOutcome: 'failed',
    });

    const flaky = unwrap(await tracker.getFlakyTests('web'));
    expect(Object.keys(flaky)).toEqual(['web']);
    expect(Object.keys(flaky.web?.tests ?? {})).toEqual(['flip']);
  });

  it('prunes history to the retention limit', async () => {
    const tracker = new FlakinessTracker(new InMemoryHistoryStore(), { historyRetention: 5, window: 3 });
    let retained = 0;
    for (let i = 0; i < 8; i += 1) {
      retained = unwrap(await tracker.ingestRun('api', report({ t: 'passed' }), `run-${i}`)).retainedRuns;
    }

    expect(retained).toBe(5);
    const health = unwrap(await tracker.getProjectHealthHistory('api'));
    expect(health).toHaveLength(5);
  });

  it('serializes concurrent ingestions for the same project', async () => {
    const tracker = new FlakinessTracker(new InMemoryHistoryStore());

    const results = await Promise.all(
      Array.from({ length: 6 }, (_, i) => tracker.ingestRun('shared', report({ t: 'passed' }), `run-${i}`)),
    );

    expect(results.map((result) => unwrap(result).retainedRuns)).toEqual([1, 2, 3, 4, 5, 6]);
  });

  it('keeps computed state and retries only the save after a storage failure', async () => {
    const store = new FailingSaveStore(1);
    const tracker = new FlakinessTracker(store);

    const result = await tracker.ingestRun('billing', report({ a: 'passed' }), 'run-1');

    expect(result.ok).toBe(false);
    if (result.ok || result.error instanceof StorageError) {
      throw new Error('expected a persistence failure');
    }
    expect(result.error.error.operation).toBe('write');
    expect(result.error.state.run.runId).toBe('run-1');
    expect(unwrap(await store.loadRuns('billing'))).toEqual([]);

    const retried = await result.error.retry();

    expect(retried.ok).toBe(true);
    expect(store.saves).toBe(2);
    expect(unwrap(await store.loadRuns('billing')).map((run) => run.runId)).toEqual(['run-1']);
  });

  it('includes unsaved runs in the next save', async () => {
    const store = new FailingSaveStore(1);
    const tracker = new FlakinessTracker(store);

    await tracker.ingestRun('billing', report({ a: 'passed' }), 'run-1');
    unwrap(await tracker.ingestRun('billing', report({ a: 'failed' }), 'run-2'));

    expect(unwrap(await store.loadRuns('billing')).map((run) => run.runId)).toEqual(['run-1', 'run-2']);
  });

  describe('trends', () => {
    it('reports duration statistics and a performance regression', async () => {
      const tracker = new FlakinessTracker(new InMemoryHistoryStore(), {
        now: steppingClock('2026-03-01T00:00:00Z', 60_000),
      });
      const durations = [1, 1, 1, 1, 1, 4, 4, 4, 4, 4];
      for (const duration of durations) {
        await tracker.ingestRun('perf', report({ slow: 'passed' }, duration));
      }

      const trends = unwrap(await tracker.getTestTrends('perf', 'slow'));

      expect(trends?.totalRuns).toBe(10);
      expect(trends?.successRate).toBe(100);
      expect(trends?.durationStats.mean).toBe(2.5);
      expect(trends?.durationStats.median).toBe(2.5);
      expect(trends?.durationStats.stdDev).toBeCloseTo(Math.sqrt(2.5), 10);
      expect(trends?.durationStats.min).toBe(1);
      expect(trends?.durationStats.max).toBe(4);
      expect(trends?.performanceRegression).toBe(true);
      expect(trends?.regressionFactor).toBe(1.6);
      expect(trends?.recentRuns).toHaveLength(10);
    });

    it('does not flag regressions on fewer than five durations', async () => {
      const tracker = new FlakinessTracker(new InMemoryHistoryStore());
      for (const duration of [1, 1, 1, 9]) {
        await tracker.ingestRun('perf', report({ slow: 'passed' }, duration));
      }

      const trends = unwrap(await tracker.getTestTrends('perf', 'slow'));

      expect(trends?.performanceRegression).toBe(false);
      expect(trends?.regressionFactor).toBeUndefined();
    });

    it('only looks at runs inside the period', async () => {
      const tracker = new FlakinessTracker(new InMemoryHistoryStore(), {
        now: steppingClock('2026-03-01T00:00:00Z', 3 * DAY_MS),
      });
      for (const outcome of ['failed', 'failed', 'passed', 'passed'] as const) {
        await tracker.ingestRun('web', report({ t: outcome }));
      }

      // The next clock reading is 12 days after the first run.
      const trends = unwrap(await tracker.getTestTrends('web', 't', { days: 7 }));

      expect(trends?.totalRuns).toBe(2);
      expect(trends?.outcomes).toEqual({ passed: 2, failed: 0, skipped: 0, error: 0 });
    });

    it('is undefined for an unknown test', async () => {
      const tracker = new FlakinessTracker(new InMemoryHistoryStore());
      await tracker.ingestRun('web', report({ t: 'passed' }));

      expect(unwrap(await tracker.getTestTrends('web', 'missing'))).toBeUndefined();
      expect(unwrap(await tracker.getTestTrends('other', 't'))).toBeUndefined();
    });
  });

  it('reports project health per run', async () => {
    const tracker = new FlakinessTracker(new InMemoryHistoryStore(), { now: () => new Date('2026-03-01T00:00:00Z') });
    await tracker.ingestRun('web', report({ a: 'passed', b: 'failed', c: 'error', d: 'passed' }));

    expect(unwrap(await tracker.getProjectHealthHistory('web'))).toEqual([
      {
        timestamp: '2026-03-01T00:00:00.000Z',
        successRate: 50,
        totalTests: 4,
        failedTests: 2,
        duration: 2,
      },
    ]);
  });
});

describe('JsonFileHistoryStore', () => {
  let workspace: string;

  beforeEach(async () => {
    workspace = await fs.mkdtemp(path.join(os.tmpdir(), 'report-sentinel-history-'));
  });

  afterEach(async () => {
    await fs.rm(workspace, { recursive: true, force: true });
  });

  it('persists history and flaky analysis and reloads them', async () => {
    const dir = path.join(workspace, '.test_history');
    const tracker = new FlakinessTracker(new JsonFileHistoryStore(dir));
    for (const outcome of ['passed', 'failed', 'passed'] as const) {
      unwrap(await tracker.ingestRun('web', report({ flip: outcome })));
    }
    unwrap(await tracker.ingestRun('api', report({ ok: 'passed' })));

    const history: unknown = JSON.parse(await fs.readFile(path.join(dir, HISTORY_FILE), 'utf8'));
    const flaky: unknown = JSON.parse(await fs.readFile(path.join(dir, FLAKY_FILE), 'utf8'));
    expect(history).toMatchObject({ web: [{}, {}, {}], api: [{}] });
    expect(flaky).toMatchObject({ web: { tests: { flip: { flakinessScore: 0.667 } } }, api: { tests: {} } });
    expect((await fs.readdir(dir)).sort()).toEqual([FLAKY_FILE, HISTORY_FILE]);

    const reopened = new FlakinessTracker(new JsonFileHistoryStore(dir));
    const next = unwrap(await reopened.ingestRun('web', report({ flip: 'failed' })));
    expect(next.retainedRuns).toBe(4);
    expect(next.flakyTests[0]?.flakinessScore).toBe(1);
  });

  it('reports a corrupt history file as a non-retryable read error', async () => {
    const dir = path.join(workspace, 'corrupt');
    await fs.mkdir(dir);
    await fs.writeFile(path.join(dir, HISTORY_FILE), '{"web": "not a list"}');
    const tracker = new FlakinessTracker(new JsonFileHistoryStore(dir));

    const result = await tracker.ingestRun('web', report({ a: 'passed' }));

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StorageError);
      if (result.error instanceof StorageError) {
        expect(result.error.operation).toBe('read');
        expect(result.error.retryable).toBe(false);
        expect(result.error.message).toContain('unexpected document shape at web');
      }
    }
  });

  it('reports an unusable location as a storage error', async () => {
    const blocker = path.join(workspace, 'blocker');
    await fs.writeFile(blocker, '');
    const tracker = new FlakinessTracker(new JsonFileHistoryStore(path.join(blocker, 'history'), { lockRetries: 0 }));

    const result = await tracker.ingestRun('web', report({ a: 'passed' }), 'run-x');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(StorageError);
    }
  });
});
