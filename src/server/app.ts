import { Hono } from "hono";
import { compress } from "hono/compress";
import { cors } from "hono/cors";

import type { AnalysisOrchestrator } from "@/domains/analysis";
import type { Logger } from "@/lib/logger";
import type { CircuitBreaker } from "@/lib/resilience/circuit-breaker";
import type { AlertStats, HealthStatus, PerformanceStats } from "@/monitoring";

import { createAnalyzeRoute } from "./routes/analyze";
import { createHealthRoute } from "./routes/health";
import { createMetricsRoute } from "./routes/metrics";

export const SERVICE_NAME = "resilience-agent";
export const SERVICE_VERSION = "0.1.0";

/** Responses whose Content-Length is below this are sent uncompressed */
export const COMPRESSION_THRESHOLD_BYTES = 1000;

export interface AppDeps {
  logger: Logger;
  orchestrator: AnalysisOrchestrator;
  healthRegistry: { getHealthStatus: () => HealthStatus };
  alertManager: { getAlertStats: () => AlertStats };
  performanceStats: PerformanceStats;
  breakers: Record<string, CircuitBreaker>;
}

export const createApp = (deps: AppDeps): Hono => {
  const app = new Hono();

  // Request logging middleware
  app.use("*", async (c, next) => {
    const start = Date.now();
    await next();
    const duration = Date.now() - start;
    deps.logger.info("HTTP request", {
      method: c.req.method,
      path: c.req.path,
      status: c.res.status,
      durationMs: duration,
    });
    deps.performanceStats.recordRequest(c.res.status, duration);
  });

  app.use("*", cors());
  app.use("*", compress({ threshold: COMPRESSION_THRESHOLD_BYTES }));

  app.get("/", (c) =>
    c.json({
      service: SERVICE_NAME,
      version: SERVICE_VERSION,
      status: "operational",
      description: "Disaster-recovery readiness analysis for architectures and services",
    }),
  );
  app.route("/health", createHealthRoute(deps.healthRegistry, deps.logger));
  app.route("/metrics", createMetricsRoute(deps));
  app.route("/analyze", createAnalyzeRoute(deps.orchestrator));

  return app;
};
