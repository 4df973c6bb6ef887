import { describe, expect, it } from 'vitest';
import { CallbackError, MalformedReportError, StorageError, getErrorMessage, toError } from '../errors.js';

describe('error hierarchy', () => {
  it('serializes storage failures with their operation and cause', () => {
    const error = new StorageError('append', '/logs/web_hallucinations.jsonl', 'EACCES', new Error('EACCES'));

    expect(error.message).toBe('Storage append failed for /logs/web_hallucinations.jsonl: EACCES');
    expect(error.retryable).toBe(true);
    expect(error.toJSON()).toMatchObject({
      code: 'STORAGE_ERROR',
      retryable: true,
      details: { operation: 'append', path: '/logs/web_hallucinations.jsonl', cause: 'EACCES' },
    });
    expect(String(error)).toBe('[STORAGE_ERROR] Storage append failed for /logs/web_hallucinations.jsonl: EACCES');
  });

  it('lists every issue of a malformed report', () => {
    const error = new MalformedReportError(['tests.0.id: Required', 'tests.1.outcome: Invalid']);

    expect(error.message).toBe('Malformed test-run report: tests.0.id: Required; tests.1.outcome: Invalid');
    expect(error.retryable).toBe(false);
    expect(new MalformedReportError([]).message).toBe('Malformed test-run report: unknown issue');
  });

  it('names the failing callback', () => {
    const error = new CallbackError('pager', 'web', new Error('timeout'));

    expect(error.toJSON().details).toEqual({ callbackName: 'pager', project: 'web', cause: 'timeout' });
  });

  it('normalizes thrown values', () => {
    expect(toError('boom').message).toBe('boom');
    expect(getErrorMessage(42)).toBe('42');
  });
});
