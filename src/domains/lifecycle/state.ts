import type { LifecyclePhase, TransitionResult } from "./types";

/**
 * Valid transitions. STARTING may fall back to STOPPING when a subsystem fails
 * to start and the ones already started are rolled back.
 */
export const LIFECYCLE_TRANSITIONS: Record<LifecyclePhase, readonly LifecyclePhase[]> = {
  STOPPED: ["STARTING"],
  STARTING: ["RUNNING", "STOPPING"],
  RUNNING: ["STOPPING"],
  STOPPING: ["STOPPED"],
};

export const transitionLifecycle = (
  from: LifecyclePhase,
  to: LifecyclePhase,
): TransitionResult<LifecyclePhase> => {
  if (!LIFECYCLE_TRANSITIONS[from].includes(to)) {
    return { ok: false, error: `Invalid lifecycle transition: ${from} -> ${to}` };
  }
  return { ok: true, state: to, from, to };
};
