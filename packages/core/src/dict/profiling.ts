// corrector/dict/profiling - Performance instrumentation
// Enable with: CORRECTOR_PROFILE=1 or CORRECTOR_PROFILE=true

import { envFlag } from '../registry.js';

// =============================================================================
// PERFORMANCE INSTRUMENTATION
// =============================================================================

let profilingOverride: boolean | undefined;

export const PERF_COUNTERS = {
  searchWithinDistance: { calls: 0, time: 0 },
  derivePluralInfo: { calls: 0, time: 0 },
  isValidVerbForm: { calls: 0, time: 0 },
  getInfinitive: { calls: 0, time: 0 },
  buildVerbRecognizer: { calls: 0, time: 0 },
  isCorrect: { calls: 0, time: 0 },
  getSuggestions: { calls: 0, time: 0 },
  correctText: { calls: 0, time: 0 },
};

export type PerfCounter = keyof typeof PERF_COUNTERS;

// Inline profiling helper - no-op when profiling disabled
export function startTimer(counter: PerfCounter): () => void {
  if (!isProfilingEnabled()) return () => {};

  const start = performance.now();
  PERF_COUNTERS[counter].calls++;

  return () => {
    PERF_COUNTERS[counter].time += performance.now() - start;
  };
}

function counterNames(): PerfCounter[] {
  return Object.keys(PERF_COUNTERS).filter((key): key is PerfCounter => key in PERF_COUNTERS);
}

export function resetPerfCounters() {
  for (const key of counterNames()) {
    PERF_COUNTERS[key].calls = 0;
    PERF_COUNTERS[key].time = 0;
  }
}

export function printPerfCountersAndReset() {
  if (!isProfilingEnabled()) {
    console.log('Performance profiling is disabled. Enable with CORRECTOR_PROFILE=1');
    return;
  }

  console.log('\n' + '='.repeat(80));
  console.log('PERFORMANCE COUNTERS');
  console.log('='.repeat(80));

  const sorted = Object.entries(PERF_COUNTERS)
    .filter(([_, stats]) => stats.calls > 0)
    .sort((a, b) => b[1].time - a[1].time);

  for (const [name, stats] of sorted) {
    const avg = stats.time / stats.calls;
    console.log(`${name.padEnd(25)} ${stats.calls.toString().padEnd(8)} calls  ${stats.time.toFixed(2).padStart(10)}ms total  ${avg.toFixed(3).padStart(8)}ms avg`);
  }
  console.log('='.repeat(80) + '\n');

  resetPerfCounters();
}

export function isProfilingEnabled(): boolean {
  return profilingOverride ?? envFlag('CORRECTOR_PROFILE');
}

/** `undefined` goes back to CORRECTOR_PROFILE. */
export function setProfiling(value: boolean | undefined) {
  profilingOverride = value;
}
