import type { Hono } from "hono";

import { createAnalyzers } from "@/adapters/analyzers";
import { createAnalysisOrchestrator } from "@/domains/analysis";
import { type LifecycleManager, createLifecycleManager, toSubsystem } from "@/domains/lifecycle";
import type { Logger } from "@/lib/logger";
import {
  createAlertManager,
  createCircuitHealthCheck,
  createDefaultAlertRules,
  createHealthRegistry,
  createLoggingAlertSink,
  createMemoryHealthCheck,
  createPerformanceStats,
} from "@/monitoring";
import { createApp } from "@/server";

export interface ServiceSettings {
  analyzers: { whitepaperUrl: string; serviceUrl: string; timeoutMs: number };
  monitoring: { healthCheckIntervalMs: number; alertCheckIntervalMs: number; maxRssMb: number };
}

export interface ServiceContext {
  app: Hono;
  lifecycle: LifecycleManager;
}

/**
 * Wires the analyzers, monitors and HTTP app together. Nothing is started:
 * the lifecycle manager owns the monitors' start/stop.
 */
export const createServiceContext = (settings: ServiceSettings, logger: Logger): ServiceContext => {
  const { whitepaperAnalyzer, serviceAnalyzer, breakers } = createAnalyzers(settings.analyzers, logger);

  const healthRegistry = createHealthRegistry({
    logger,
    intervalMs: settings.monitoring.healthCheckIntervalMs,
    checks: [
      createMemoryHealthCheck(settings.monitoring.maxRssMb),
      createCircuitHealthCheck(breakers),
    ],
  });
  const performanceStats = createPerformanceStats();
  const alertManager = createAlertManager({
    rules: createDefaultAlertRules({ healthRegistry, performanceStats }),
    logger,
    sink: createLoggingAlertSink(logger),
    intervalMs: settings.monitoring.alertCheckIntervalMs,
  });

  const lifecycle = createLifecycleManager({
    subsystems: [
      toSubsystem("health-monitor", healthRegistry),
      toSubsystem("alert-manager", alertManager),
    ],
    logger,
  });

  const app = createApp({
    logger,
    orchestrator: createAnalysisOrchestrator({ whitepaperAnalyzer, serviceAnalyzer, logger }),
    healthRegistry,
    alertManager,
    performanceStats,
    breakers,
  });

  return { app, lifecycle };
};
