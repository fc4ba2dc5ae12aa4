import { describe, expect, it } from "vitest";

import { createPerformanceStats } from "./performance-stats";

describe("createPerformanceStats", () => {
  it("should start empty", () => {
    expect(createPerformanceStats().getStats()).toEqual({
      requestsTotal: 0,
      serverErrorsTotal: 0,
      windowErrorRate: 0,
      windowSize: 0,
      averageDurationMs: 0,
      p95DurationMs: 0,
    });
  });

  it("should count requests and server errors", () => {
    const stats = createPerformanceStats();

    stats.recordRequest(200, 10);
    stats.recordRequest(400, 20);
    stats.recordRequest(500, 30);
    stats.recordRequest(503, 40);

    expect(stats.getStats()).toMatchObject({
      requestsTotal: 4,
      serverErrorsTotal: 2,
      windowErrorRate: 0.5,
      averageDurationMs: 25,
      p95DurationMs: 40,
    });
  });

  it("should compute p95 over the window", () => {
    const stats = createPerformanceStats();
    for (let duration = 1; duration <= 100; duration++) {
      stats.recordRequest(200, duration);
    }

    expect(stats.getStats().p95DurationMs).toBe(95);
  });

  it("should bound the window but keep lifetime totals", () => {
    const stats = createPerformanceStats(3);

    stats.recordRequest(500, 100);
    stats.recordRequest(200, 1);
    stats.recordRequest(200, 2);
    stats.recordRequest(200, 3);

    expect(stats.getStats()).toMatchObject({
      requestsTotal: 4,
      serverErrorsTotal: 1,
      windowSize: 3,
      windowErrorRate: 0,
      averageDurationMs: 2,
    });
  });
});
