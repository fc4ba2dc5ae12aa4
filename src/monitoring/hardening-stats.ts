import type { CircuitBreaker, CircuitBreakerStats } from "@/lib/resilience/circuit-breaker";

export interface HardeningSnapshot {
  circuitBreakers: Record<string, CircuitBreakerStats>;
  openCircuits: number;
}

export const collectHardeningStats = (
  breakers: Readonly<Record<string, CircuitBreaker>>,
): HardeningSnapshot => {
  const circuitBreakers: Record<string, CircuitBreakerStats> = {};
  let openCircuits = 0;

  for (const [name, breaker] of Object.entries(breakers)) {
    const stats = breaker.getStats();
    circuitBreakers[name] = stats;
    if (stats.state === "OPEN") openCircuits++;
  }

  return { circuitBreakers, openCircuits };
};
