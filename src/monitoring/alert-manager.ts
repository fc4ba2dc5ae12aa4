/**
 * Alert manager: evaluates alert rules on an interval and delivers
 * fire/resolve transitions to a sink.
 *
 * An alert fires once when its rule starts matching and resolves once when it
 * stops; a rule that keeps matching does not re-notify.
 */

import type { MonitorControls, SubsystemState } from "@/domains/lifecycle/types";
import { toError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

export type AlertSeverity = "info" | "warning" | "critical";

export interface AlertRule {
  name: string;
  severity: AlertSeverity;
  message: string;
  /** True while the alert condition holds */
  evaluate: () => boolean | Promise<boolean>;
}

export interface ActiveAlert {
  rule: string;
  severity: AlertSeverity;
  message: string;
  firedAt: string;
}

export type AlertEvent =
  | { type: "fired"; alert: ActiveAlert }
  | { type: "resolved"; alert: ActiveAlert; resolvedAt: string };

/** Delivery is external; a sink may post to a pager, a chat channel, or a log. */
export type AlertSink = (event: AlertEvent) => void | Promise<void>;

export interface AlertStats {
  monitoring: boolean;
  activeAlerts: ActiveAlert[];
  totalFired: number;
  totalResolved: number;
  activeBySeverity: Record<AlertSeverity, number>;
}

export interface AlertManagerConfig {
  rules: readonly AlertRule[];
  logger: Logger;
  sink?: AlertSink;
  /** Evaluation period (default: 60000ms) */
  intervalMs?: number;
}

export interface AlertManager extends MonitorControls {
  /** Evaluate every rule once; concurrent callers share one pass */
  evaluate: () => Promise<void>;
  getAlertStats: () => AlertStats;
}

export const createLoggingAlertSink =
  (logger: Logger): AlertSink =>
  (event) => {
    const context = {
      rule: event.alert.rule,
      severity: event.alert.severity,
      message: event.alert.message,
    };
    if (event.type === "resolved") {
      logger.info("Alert resolved", context);
    } else if (event.alert.severity === "critical") {
      logger.error("Alert fired", undefined, context);
    } else {
      logger.warn("Alert fired", context);
    }
  };

export const createAlertManager = (config: AlertManagerConfig): AlertManager => {
  const { rules, logger, intervalMs = 60000 } = config;
  const sink = config.sink ?? createLoggingAlertSink(logger);

  const active = new Map<string, ActiveAlert>();
  let totalFired = 0;
  let totalResolved = 0;

  let state: SubsystemState = "uninitialized";
  let evaluationInterval: NodeJS.Timeout | null = null;
  let inFlight: Promise<void> | null = null;

  const deliver = async (event: AlertEvent): Promise<void> => {
    try {
      await sink(event);
    } catch (error) {
      logger.error("Alert delivery failed", toError(error), {
        rule: event.alert.rule,
        type: event.type,
      });
    }
  };

  const evaluateRule = async (rule: AlertRule): Promise<void> => {
    let firing: boolean;
    try {
      firing = await rule.evaluate();
    } catch (error) {
      logger.warn("Alert rule evaluation failed", {
        rule: rule.name,
        error: toError(error).message,
      });
      return;
    }

    const current = active.get(rule.name);
    if (firing && !current) {
      const alert: ActiveAlert = {
        rule: rule.name,
        severity: rule.severity,
        message: rule.message,
        firedAt: new Date().toISOString(),
      };
      active.set(rule.name, alert);
      totalFired++;
      await deliver({ type: "fired", alert });
    } else if (!firing && current) {
      active.delete(rule.name);
      totalResolved++;
      await deliver({ type: "resolved", alert: current, resolvedAt: new Date().toISOString() });
    }
  };

  const runPass = async (): Promise<void> => {
    for (const rule of rules) {
      await evaluateRule(rule);
    }
  };

  const evaluate = (): Promise<void> => {
    if (inFlight) return inFlight;
    inFlight = runPass().finally(() => {
      inFlight = null;
    });
    return inFlight;
  };

  const startMonitoring = async (): Promise<void> => {
    if (state === "running") return;
    state = "running";

    await evaluate();
    if (state !== "running") return;

    evaluationInterval = setInterval(() => {
      evaluate().catch((error: unknown) => {
        logger.error("Alert evaluation failed", toError(error));
      });
    }, intervalMs);
    logger.info("Alert monitoring started", { rules: rules.length, intervalMs });
  };

  const stopMonitoring = (): void => {
    if (state !== "running") return;
    if (evaluationInterval) {
      clearInterval(evaluationInterval);
      evaluationInterval = null;
    }
    state = "stopped";
    logger.info("Alert monitoring stopped");
  };

  const getAlertStats = (): AlertStats => {
    const activeAlerts = [...active.values()];
    const activeBySeverity: Record<AlertSeverity, number> = { info: 0, warning: 0, critical: 0 };
    for (const alert of activeAlerts) {
      activeBySeverity[alert.severity]++;
    }

    return {
      monitoring: state === "running",
      activeAlerts,
      totalFired,
      totalResolved,
      activeBySeverity,
    };
  };

  return {
    evaluate,
    getAlertStats,
    startMonitoring,
    stopMonitoring,
    getState: () => state,
  };
};
