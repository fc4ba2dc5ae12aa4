/**
 * Health registry: named health checks refreshed in the background.
 *
 * Each check runs through the same runner as the readiness checks, so a
 * throwing check is recorded as unhealthy instead of breaking the pass.
 */

import { runCheck } from "@/domains/readiness/runner";
import type { CheckFn, CheckResult } from "@/domains/readiness/types";
import type { MonitorControls, SubsystemState } from "@/domains/lifecycle/types";
import { toError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

export interface HealthCheckDefinition {
  name: string;
  check: CheckFn;
}

export interface HealthCheckStatus {
  healthy: boolean;
  message: string;
  durationMs: number;
  lastChecked: string;
}

export interface HealthStatus {
  /** Every registered check has run and passed; true for an empty registry */
  overallHealthy: boolean;
  timestamp: string;
  individualStatus: Record<string, HealthCheckStatus>;
}

export interface HealthRegistryConfig {
  logger: Logger;
  checks?: readonly HealthCheckDefinition[];
  /** Refresh period (default: 30000ms) */
  intervalMs?: number;
}

export interface HealthRegistry extends MonitorControls {
  register: (definition: HealthCheckDefinition) => void;
  /** Run every check once; concurrent callers share one pass */
  runChecks: () => Promise<HealthStatus>;
  getHealthStatus: () => HealthStatus;
}

export const createHealthRegistry = (config: HealthRegistryConfig): HealthRegistry => {
  const { logger, intervalMs = 30000 } = config;

  const definitions = new Map<string, HealthCheckDefinition>();
  const latest = new Map<string, HealthCheckStatus>();

  let state: SubsystemState = "uninitialized";
  let refreshInterval: NodeJS.Timeout | null = null;
  let inFlight: Promise<HealthStatus> | null = null;

  const register = (definition: HealthCheckDefinition): void => {
    if (definitions.has(definition.name)) {
      throw new Error(`Health check already registered: ${definition.name}`);
    }
    definitions.set(definition.name, definition);
  };

  for (const definition of config.checks ?? []) {
    register(definition);
  }

  const getHealthStatus = (): HealthStatus => {
    const individualStatus: Record<string, HealthCheckStatus> = {};
    let overallHealthy = true;

    for (const name of definitions.keys()) {
      const status = latest.get(name);
      if (!status) {
        overallHealthy = false;
        continue;
      }
      individualStatus[name] = status;
      overallHealthy &&= status.healthy;
    }

    return { overallHealthy, timestamp: new Date().toISOString(), individualStatus };
  };

  const record = (result: CheckResult): void => {
    const previous = latest.get(result.name);
    latest.set(result.name, {
      healthy: result.success,
      message: result.message,
      durationMs: result.durationMs,
      lastChecked: new Date().toISOString(),
    });

    if (previous?.healthy !== false && !result.success) {
      logger.warn("Health check failing", { check: result.name, message: result.message });
    } else if (previous?.healthy === false && result.success) {
      logger.info("Health check recovered", { check: result.name });
    }
  };

  const runPass = async (): Promise<HealthStatus> => {
    const results = await Promise.all(
      [...definitions.values()].map((definition) => runCheck(definition.name, definition.check)),
    );
    for (const result of results) {
      record(result);
    }
    return getHealthStatus();
  };

  const runChecks = (): Promise<HealthStatus> => {
    if (inFlight) return inFlight;
    inFlight = runPass().finally(() => {
      inFlight = null;
    });
    return inFlight;
  };

  const startMonitoring = async (): Promise<void> => {
    if (state === "running") return;
    state = "running";

    await runChecks();
    if (state !== "running") return;

    refreshInterval = setInterval(() => {
      runChecks().catch((error: unknown) => {
        logger.error("Health refresh failed", toError(error));
      });
    }, intervalMs);
    logger.info("Health monitoring started", { checks: definitions.size, intervalMs });
  };

  const stopMonitoring = (): void => {
    if (state !== "running") return;
    if (refreshInterval) {
      clearInterval(refreshInterval);
      refreshInterval = null;
    }
    state = "stopped";
    logger.info("Health monitoring stopped");
  };

  return {
    register,
    runChecks,
    getHealthStatus,
    startMonitoring,
    stopMonitoring,
    getState: () => state,
  };
};
