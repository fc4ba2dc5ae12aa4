export {
  createAlertManager,
  createLoggingAlertSink,
  type ActiveAlert,
  type AlertEvent,
  type AlertManager,
  type AlertRule,
  type AlertSeverity,
  type AlertSink,
  type AlertStats,
} from "./alert-manager";
export { createCircuitHealthCheck, createMemoryHealthCheck } from "./default-checks";
export { createDefaultAlertRules } from "./default-rules";
export { collectHardeningStats, type HardeningSnapshot } from "./hardening-stats";
export {
  createHealthRegistry,
  type HealthCheckDefinition,
  type HealthCheckStatus,
  type HealthRegistry,
  type HealthStatus,
} from "./health-registry";
export {
  createPerformanceStats,
  type PerformanceSnapshot,
  type PerformanceStats,
} from "./performance-stats";
