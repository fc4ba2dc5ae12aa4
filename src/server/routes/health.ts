import { Hono } from "hono";

import { errorMessage, toError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import type { HealthStatus } from "@/monitoring";

export interface HealthSource {
  getHealthStatus: () => HealthStatus;
}

export type HealthEnvelope =
  | {
      status: "healthy" | "unhealthy";
      timestamp: string;
      checks: Record<
        string,
        { healthy: boolean; message: string; duration_ms: number; last_checked: string }
      >;
    }
  | { status: "error"; timestamp: string; error: string };

export const toHealthEnvelope = (health: HealthStatus): HealthEnvelope => ({
  status: health.overallHealthy ? "healthy" : "unhealthy",
  timestamp: health.timestamp,
  checks: Object.fromEntries(
    Object.entries(health.individualStatus).map(([name, check]) => [
      name,
      {
        healthy: check.healthy,
        message: check.message,
        duration_ms: check.durationMs,
        last_checked: check.lastChecked,
      },
    ]),
  ),
});

export const createHealthRoute = (source: HealthSource, logger: Logger): Hono => {
  const health = new Hono();

  health.get("/", (c) => {
    try {
      const envelope = toHealthEnvelope(source.getHealthStatus());
      return c.json(envelope, envelope.status === "healthy" ? 200 : 503);
    } catch (error) {
      logger.error("Failed to read health status", toError(error));
      const envelope: HealthEnvelope = {
        status: "error",
        timestamp: new Date().toISOString(),
        error: errorMessage(error),
      };
      return c.json(envelope, 503);
    }
  });

  return health;
};
