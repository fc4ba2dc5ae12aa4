import type { Analyzer } from "@/domains/analysis/types";
import type { Logger } from "@/lib/logger";
import { type CircuitBreaker, createCircuitBreaker } from "@/lib/resilience/circuit-breaker";

import { createRestAnalyzer } from "./rest";

export interface AnalyzersConfig {
  whitepaperUrl: string;
  serviceUrl: string;
  timeoutMs: number;
}

export interface AnalyzerSet {
  whitepaperAnalyzer: Analyzer;
  serviceAnalyzer: Analyzer;
  /** Keyed by analyzer name, for health checks and hardening stats */
  breakers: Record<string, CircuitBreaker>;
}

export const createAnalyzers = (config: AnalyzersConfig, logger: Logger): AnalyzerSet => {
  const breakers = {
    whitepaper: createCircuitBreaker(),
    services: createCircuitBreaker(),
  };

  for (const [analyzer, breaker] of Object.entries(breakers)) {
    breaker.onStateChange((state) => {
      if (state === "OPEN") {
        logger.warn("Analyzer circuit opened", { analyzer });
      } else {
        logger.info("Analyzer circuit state changed", { analyzer, state });
      }
    });
  }

  return {
    whitepaperAnalyzer: createRestAnalyzer({
      name: "whitepaper",
      baseUrl: config.whitepaperUrl,
      payloadField: "architecture_data",
      timeoutMs: config.timeoutMs,
      breaker: breakers.whitepaper,
    }),
    serviceAnalyzer: createRestAnalyzer({
      name: "services",
      baseUrl: config.serviceUrl,
      payloadField: "services",
      timeoutMs: config.timeoutMs,
      breaker: breakers.services,
    }),
    breakers,
  };
};

export { createRestAnalyzer, type PayloadField, type RestAnalyzerConfig } from "./rest";
