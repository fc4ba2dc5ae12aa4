import type { CircuitBreaker } from "@/lib/resilience/circuit-breaker";

import type { HealthCheckDefinition } from "./health-registry";

const BYTES_PER_MB = 1024 * 1024;

export const createMemoryHealthCheck = (
  maxRssMb: number,
  readRss: () => number = () => process.memoryUsage.rss(),
): HealthCheckDefinition => ({
  name: "process_memory",
  check: () => {
    const rssMb = Math.round(readRss() / BYTES_PER_MB);
    return {
      success: rssMb < maxRssMb,
      message: `RSS ${rssMb} MB (limit ${maxRssMb} MB)`,
    };
  },
});

export const createCircuitHealthCheck = (
  breakers: Readonly<Record<string, CircuitBreaker>>,
): HealthCheckDefinition => ({
  name: "analyzer_circuits",
  check: () => {
    const open = Object.entries(breakers)
      .filter(([, breaker]) => breaker.isOpen())
      .map(([name]) => name);
    return open.length === 0
      ? { success: true, message: "No analyzer circuit open" }
      : { success: false, message: `Open circuits: ${open.join(", ")}` };
  },
});
