/**
 * Request counters and latency over a sliding window of recent requests.
 */

const DEFAULT_WINDOW_SIZE = 1000;

export interface PerformanceSnapshot {
  requestsTotal: number;
  serverErrorsTotal: number;
  /** Share of 5xx responses among the requests in the window */
  windowErrorRate: number;
  windowSize: number;
  averageDurationMs: number;
  p95DurationMs: number;
}

export interface PerformanceStats {
  recordRequest: (status: number, durationMs: number) => void;
  getStats: () => PerformanceSnapshot;
}

interface Sample {
  durationMs: number;
  serverError: boolean;
}

const percentile = (sorted: readonly number[], p: number): number => {
  if (sorted.length === 0) return 0;
  const rank = Math.ceil((p / 100) * sorted.length) - 1;
  return sorted[Math.min(Math.max(rank, 0), sorted.length - 1)];
};

export const createPerformanceStats = (windowSize = DEFAULT_WINDOW_SIZE): PerformanceStats => {
  const samples: Sample[] = [];
  let requestsTotal = 0;
  let serverErrorsTotal = 0;

  const recordRequest = (status: number, durationMs: number): void => {
    const serverError = status >= 500;
    requestsTotal++;
    if (serverError) serverErrorsTotal++;

    samples.push({ durationMs, serverError });
    // Keep only the last `windowSize` samples to bound memory
    if (samples.length > windowSize) {
      samples.shift();
    }
  };

  const getStats = (): PerformanceSnapshot => {
    const durations = samples.map((sample) => sample.durationMs).sort((a, b) => a - b);
    const total = durations.reduce((sum, duration) => sum + duration, 0);
    const errors = samples.filter((sample) => sample.serverError).length;

    return {
      requestsTotal,
      serverErrorsTotal,
      windowErrorRate: samples.length === 0 ? 0 : errors / samples.length,
      windowSize: samples.length,
      averageDurationMs: durations.length === 0 ? 0 : total / durations.length,
      p95DurationMs: percentile(durations, 95),
    };
  };

  return { recordRequest, getStats };
};
