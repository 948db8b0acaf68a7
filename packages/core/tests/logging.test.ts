import { afterEach, describe, test, expect, vi } from 'vitest';
import { dp, isDebugEnabled, setDebug } from '../src/registry.js';
import {
  PERF_COUNTERS,
  isProfilingEnabled,
  resetPerfCounters,
  setProfiling,
  startTimer,
} from '../src/dict/profiling.js';

afterEach(() => {
  vi.unstubAllEnvs();
  vi.restoreAllMocks();
  setDebug(undefined);
  setProfiling(undefined);
  resetPerfCounters();
});

describe('dp', () => {
  test('follows CORRECTOR_DEBUG set after the module loaded', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubEnv('CORRECTOR_DEBUG', '1');

    dp('loaded', 3);

    expect(isDebugEnabled()).toBe(true);
    expect(log).toHaveBeenCalledWith('[DEBUG]', 'loaded', 3);
  });

  test('is silent without CORRECTOR_DEBUG', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => {});
    vi.stubEnv('CORRECTOR_DEBUG', '');

    dp('loaded', 3);

    expect(log).not.toHaveBeenCalled();
  });

  test('setDebug overrides the environment until cleared', () => {
    vi.stubEnv('CORRECTOR_DEBUG', 'true');

    setDebug(false);
    expect(isDebugEnabled()).toBe(false);

    setDebug(undefined);
    expect(isDebugEnabled()).toBe(true);
  });
});

describe('startTimer', () => {
  test('counts calls when CORRECTOR_PROFILE is set after the module loaded', () => {
    vi.stubEnv('CORRECTOR_PROFILE', '1');

    const stop = startTimer('isCorrect');
    stop();

    expect(isProfilingEnabled()).toBe(true);
    expect(PERF_COUNTERS.isCorrect.calls).toBe(1);
  });

  test('is a no-op when profiling is off', () => {
    vi.stubEnv('CORRECTOR_PROFILE', '');

    startTimer('isCorrect')();

    expect(PERF_COUNTERS.isCorrect.calls).toBe(0);
  });
});
