/**
 * Lifecycle types for the monitoring subsystems that run around request serving.
 */

export type LifecyclePhase = "STOPPED" | "STARTING" | "RUNNING" | "STOPPING";

/** State of a single process-wide monitoring subsystem. */
export type SubsystemState = "uninitialized" | "running" | "stopped";

/**
 * Anything the lifecycle manager can start before serving and stop after.
 * Both operations must be no-ops when already in the target state.
 */
export interface MonitoringSubsystem {
  name: string;
  start: () => void | Promise<void>;
  stop: () => void | Promise<void>;
  getState: () => SubsystemState;
}

/** The shape the health registry and alert manager expose. */
export interface MonitorControls {
  startMonitoring: () => void | Promise<void>;
  stopMonitoring: () => void | Promise<void>;
  getState: () => SubsystemState;
}

export type TransitionResult<T> =
  | { ok: true; state: T; from: T; to: T }
  | { ok: false; error: string };
