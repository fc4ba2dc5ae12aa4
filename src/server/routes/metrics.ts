import { Hono } from "hono";

import { ServiceError, errorMessage, toError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type { CircuitBreaker } from "@/lib/resilience/circuit-breaker";
import {
  type AlertStats,
  type HealthStatus,
  type PerformanceStats,
  collectHardeningStats,
} from "@/monitoring";

import { errorResponse } from "../responses";
import { toHealthEnvelope } from "./health";

export interface MetricsDeps {
  performanceStats: PerformanceStats;
  breakers: Record<string, CircuitBreaker>;
  healthRegistry: { getHealthStatus: () => HealthStatus };
  alertManager: { getAlertStats: () => AlertStats };
  logger: Logger;
}

export const createMetricsRoute = (deps: MetricsDeps): Hono => {
  const metrics = new Hono();

  metrics.get("/", (c) => {
    try {
      return c.json({
        performance: deps.performanceStats.getStats(),
        hardening: collectHardeningStats(deps.breakers),
        health: toHealthEnvelope(deps.healthRegistry.getHealthStatus()),
        alerts: deps.alertManager.getAlertStats(),
        timestamp: new Date().toISOString(),
      });
    } catch (error) {
      deps.logger.error("Failed to collect metrics", toError(error));
      return errorResponse(
        c,
        new ServiceError(`Failed to collect metrics: ${errorMessage(error)}`, "aggregation", error),
      );
    }
  });

  return metrics;
};
