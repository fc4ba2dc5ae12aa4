import type { MonitorControls, MonitoringSubsystem } from "./types";

export const toSubsystem = (name: string, monitor: MonitorControls): MonitoringSubsystem => ({
  name,
  start: () => monitor.startMonitoring(),
  stop: () => monitor.stopMonitoring(),
  getState: () => monitor.getState(),
});
