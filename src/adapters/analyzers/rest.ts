/**
 * REST clients for the external analysis engines.
 *
 * Each engine exposes `POST <baseUrl>/analyze` taking
 * `{ <payloadField>, rpo_target, rto_target }` and answering with a JSON
 * result document.
 */

import * as v from "valibot";

import { analysisDocumentSchema } from "@/domains/analysis/schemas";
import type {
  AnalysisDocument,
  AnalysisPayload,
  Analyzer,
  RecoveryTargets,
} from "@/domains/analysis/types";
import {
  type CircuitBreaker,
  DEFAULT_CIRCUIT_BREAKER_CONFIG,
  createCircuitBreaker,
} from "@/lib/resilience/circuit-breaker";

export type PayloadField = "architecture_data" | "services";

export interface RestAnalyzerConfig {
  name: string;
  baseUrl: string;
  payloadField: PayloadField;
  timeoutMs: number;
  breaker?: CircuitBreaker;
}

export const createRestAnalyzer = (config: RestAnalyzerConfig): Analyzer => {
  const { name, payloadField, timeoutMs } = config;
  const url = `${config.baseUrl.replace(/\/$/, "")}/analyze`;
  const breaker = config.breaker ?? createCircuitBreaker(DEFAULT_CIRCUIT_BREAKER_CONFIG);

  const post = async (
    payload: AnalysisPayload,
    targets: RecoveryTargets,
  ): Promise<AnalysisDocument> => {
    const res = await fetch(url, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({
        [payloadField]: payload,
        rpo_target: targets.rpoTarget,
        rto_target: targets.rtoTarget,
      }),
      signal: AbortSignal.timeout(timeoutMs),
    });
    if (!res.ok) {
      throw new Error(`${name} engine request failed: ${res.status} ${res.statusText}`);
    }
    const data: unknown = await res.json();
    return v.parse(analysisDocumentSchema, data);
  };

  return {
    name,
    analyze: (payload, targets) => breaker.execute(() => post(payload, targets)),
  };
};
