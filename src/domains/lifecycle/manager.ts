/**
 * Lifecycle manager: ordered startup and reverse-ordered, best-effort shutdown
 * of the monitoring subsystems around one serve-loop lifetime.
 */

import { ServiceError, errorMessage, toError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import { transitionLifecycle } from "./state";
import type { LifecyclePhase, MonitoringSubsystem } from "./types";

export interface LifecycleManagerDeps {
  /** Started in this order, stopped in reverse */
  subsystems: readonly MonitoringSubsystem[];
  logger: Logger;
}

export interface LifecycleManager {
  /**
   * Starts every subsystem. Rejects with a `lifecycle` ServiceError when one
   * fails, after stopping the ones already started. No-op while RUNNING.
   */
  startup: () => Promise<void>;
  /** Stops every subsystem, continuing past failures. No-op while STOPPED. */
  shutdown: () => Promise<void>;
  getPhase: () => LifecyclePhase;
}

export const createLifecycleManager = (deps: LifecycleManagerDeps): LifecycleManager => {
  const { subsystems, logger } = deps;

  let phase: LifecyclePhase = "STOPPED";
  let pendingStartup: Promise<void> | null = null;
  let pendingShutdown: Promise<void> | null = null;

  const moveTo = (target: LifecyclePhase): void => {
    const result = transitionLifecycle(phase, target);
    if (!result.ok) {
      throw new ServiceError(result.error, "lifecycle");
    }
    phase = result.state;
    logger.debug("Lifecycle phase changed", { from: result.from, to: result.to });
  };

  const stopAll = async (started: readonly MonitoringSubsystem[]): Promise<void> => {
    for (const subsystem of [...started].reverse()) {
      try {
        await subsystem.stop();
        logger.info("Subsystem stopped", { subsystem: subsystem.name });
      } catch (error) {
        logger.error("Failed to stop subsystem", toError(error), { subsystem: subsystem.name });
      }
    }
  };

  const runStartup = async (): Promise<void> => {
    moveTo("STARTING");
    const started: MonitoringSubsystem[] = [];

    for (const subsystem of subsystems) {
      try {
        await subsystem.start();
      } catch (error) {
        logger.error("Failed to start subsystem", toError(error), { subsystem: subsystem.name });
        moveTo("STOPPING");
        await stopAll(started);
        moveTo("STOPPED");
        throw new ServiceError(
          `Failed to start ${subsystem.name}: ${errorMessage(error)}`,
          "lifecycle",
          error,
        );
      }
      started.push(subsystem);
      logger.info("Subsystem started", { subsystem: subsystem.name });
    }

    moveTo("RUNNING");
  };

  const runShutdown = async (): Promise<void> => {
    moveTo("STOPPING");
    await stopAll(subsystems);
    moveTo("STOPPED");
  };

  const startup = (): Promise<void> => {
    if (pendingStartup) return pendingStartup;
    if (phase === "RUNNING") return Promise.resolve();
    if (phase !== "STOPPED") {
      return Promise.reject(new ServiceError(`Cannot start while ${phase}`, "lifecycle"));
    }

    pendingStartup = runStartup().finally(() => {
      pendingStartup = null;
    });
    return pendingStartup;
  };

  const shutdown = (): Promise<void> => {
    if (pendingShutdown) return pendingShutdown;
    if (pendingStartup) {
      // a failed startup has already rolled back
      return pendingStartup.then(shutdown, () => undefined);
    }
    if (phase === "STOPPED") return Promise.resolve();
    if (phase !== "RUNNING") {
      return Promise.reject(new ServiceError(`Cannot shut down while ${phase}`, "lifecycle"));
    }

    pendingShutdown = runShutdown().finally(() => {
      pendingShutdown = null;
    });
    return pendingShutdown;
  };

  return {
    startup,
    shutdown,
    getPhase: () => phase,
  };
};

/**
 * Scoped lifecycle: monitoring is up before `serve` runs and torn down on
 * every exit path of `serve`, including a rejection.
 */
export const withLifecycle = async <T>(
  manager: LifecycleManager,
  serve: () => Promise<T>,
): Promise<T> => {
  await manager.startup();
  try {
    return await serve();
  } finally {
    await manager.shutdown();
  }
};
