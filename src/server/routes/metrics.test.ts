import { describe, expect, it, vi } from "vitest";

import type { Logger } from "@/lib/logger";
import { createCircuitBreaker } from "@/lib/resilience/circuit-breaker";
import { type AlertStats, createPerformanceStats } from "@/monitoring";

import { createMetricsRoute } from "./metrics";

const mockLogger: Logger = {
  debug: vi.fn(),
  info: vi.fn(),
  warn: vi.fn(),
  error: vi.fn(),
};

const alertStats: AlertStats = {
  monitoring: true,
  activeAlerts: [],
  totalFired: 0,
  totalResolved: 0,
  activeBySeverity: { info: 0, warning: 0, critical: 0 },
};

describe("metrics route", () => {
  it("should assemble performance, hardening, health and alert snapshots", async () => {
    const performanceStats = createPerformanceStats();
    performanceStats.recordRequest(200, 10);
    performanceStats.recordRequest(500, 30);

    const app = createMetricsRoute({
      performanceStats,
      breakers: { whitepaper: createCircuitBreaker() },
      healthRegistry: {
        getHealthStatus: () => ({
          overallHealthy: true,
          timestamp: "2026-01-01T00:00:00.000Z",
          individualStatus: {},
        }),
      },
      alertManager: { getAlertStats: () => alertStats },
      logger: mockLogger,
    });

    const res = await app.fetch(new Request("http://localhost/"));
    const body = (await res.json()) as {
      performance: { requestsTotal: number; serverErrorsTotal: number; windowErrorRate: number };
      hardening: { openCircuits: number };
      health: { status: string };
      alerts: AlertStats;
    };

    expect(res.status).toBe(200);
    expect(body.performance.requestsTotal).toBe(2);
    expect(body.performance.serverErrorsTotal).toBe(1);
    expect(body.performance.windowErrorRate).toBe(0.5);
    expect(body.hardening.openCircuits).toBe(0);
    expect(body.health.status).toBe("healthy");
    expect(body.alerts).toEqual(alertStats);
  });

  it("should return a 500 envelope when a snapshot fails", async () => {
    const app = createMetricsRoute({
      performanceStats: createPerformanceStats(),
      breakers: {},
      healthRegistry: {
        getHealthStatus: () => ({
          overallHealthy: true,
          timestamp: "2026-01-01T00:00:00.000Z",
          individualStatus: {},
        }),
      },
      alertManager: {
        getAlertStats: () => {
          throw new Error("alert store offline");
        },
      },
      logger: mockLogger,
    });

    const res = await app.fetch(new Request("http://localhost/"));

    expect(res.status).toBe(500);
    expect(await res.json()).toEqual({
      status: "error",
      kind: "aggregation",
      error: "Failed to collect metrics: alert store offline",
    });
  });
});
