export { createLifecycleManager, withLifecycle, type LifecycleManager } from "./manager";
export { LIFECYCLE_TRANSITIONS, transitionLifecycle } from "./state";
export { toSubsystem } from "./subsystem";
export type { LifecyclePhase, MonitorControls, MonitoringSubsystem, SubsystemState } from "./types";
