import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest';
import { isLogLevel, logDebug, logError, logInfo, logWarning, setLogLevel } from '../logger.js';

beforeEach(() => {
  setLogLevel('debug');
});

afterEach(() => {
  vi.restoreAllMocks();
});

describe('telemetry logger', () => {
  const cases = [
    { fn: logInfo, level: 'info' as const, method: 'error' as const },
    { fn: logWarning, level: 'warn' as const, method: 'warn' as const },
    { fn: logError, level: 'error' as const, method: 'error' as const },
    { fn: logDebug, level: 'debug' as const, method: 'error' as const },
  ];

  for (const { fn, level, method } of cases) {
    it(`logs message only for ${level} when context is empty`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});

      fn('hello', {});

      expect(spy).toHaveBeenCalledWith('hello');
    });

    it(`logs message and context for ${level} when context has keys`, () => {
      const spy = vi.spyOn(console, method).mockImplementation(() => {});
      const context = { project: 'billing' };

      fn('hello', context);

      expect(spy).toHaveBeenCalledWith('hello', context);
    });
  }

  it('drops messages below the minimum level', () => {
    setLogLevel('warn');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warnSpy = vi.spyOn(console, 'warn').mockImplementation(() => {});

    logInfo('quiet');
    logDebug('quieter');
    logWarning('loud');

    expect(errorSpy).not.toHaveBeenCalled();
    expect(warnSpy).toHaveBeenCalledWith('loud');
  });

  it('silent suppresses errors too', () => {
    setLogLevel('silent');
    const errorSpy = vi.spyOn(console, 'error').mockImplementation(() => {});

    logError('nothing');

    expect(errorSpy).not.toHaveBeenCalled();
  });

  it('recognizes level names', () => {
    expect(isLogLevel('warn')).toBe(true);
    expect(isLogLevel('verbose')).toBe(false);
  });
});
