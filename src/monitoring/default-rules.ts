import type { AlertRule } from "./alert-manager";
import type { HealthRegistry } from "./health-registry";
import type { PerformanceStats } from "./performance-stats";

export const ERROR_RATE_THRESHOLD = 0.1;
export const ERROR_RATE_MIN_SAMPLES = 20;

export const createDefaultAlertRules = (deps: {
  healthRegistry: HealthRegistry;
  performanceStats: PerformanceStats;
}): AlertRule[] => [
  {
    name: "service_unhealthy",
    severity: "critical",
    message: "One or more health checks are failing",
    evaluate: () => !deps.healthRegistry.getHealthStatus().overallHealthy,
  },
  {
    name: "high_error_rate",
    severity: "warning",
    message: `More than ${ERROR_RATE_THRESHOLD * 100}% of recent requests failed with a server error`,
    evaluate: () => {
      const stats = deps.performanceStats.getStats();
      return (
        stats.windowSize >= ERROR_RATE_MIN_SAMPLES && stats.windowErrorRate > ERROR_RATE_THRESHOLD
      );
    },
  },
];
