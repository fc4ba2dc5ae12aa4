/**
 * Analysis orchestrator: validates requests, fans them out to the whitepaper
 * and service engines and combines their scores.
 *
 * Failures come back as Result values tagged with a kind so the HTTP layer
 * can tell a bad request from an engine outage:
 * - validation: a required payload is missing or empty
 * - collaborator: an engine call failed
 * - aggregation: an engine returned a non-numeric `overall_score`
 */

import { ServiceError, errorMessage, toError, validationError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";
import { type Result, fail, ok } from "@/lib/result";

import type {
  AnalysisDocument,
  AnalysisPayload,
  AnalysisRequest,
  Analyzer,
  ComprehensiveAnalysis,
  RecoveryTargets,
} from "./types";

export interface AnalysisOrchestratorDeps {
  whitepaperAnalyzer: Analyzer;
  serviceAnalyzer: Analyzer;
  logger: Logger;
}

export interface AnalysisOrchestrator {
  analyzeWhitepaper: (request: AnalysisRequest) => Promise<Result<AnalysisDocument>>;
  analyzeServices: (request: AnalysisRequest) => Promise<Result<AnalysisDocument>>;
  analyzeComprehensive: (request: AnalysisRequest) => Promise<Result<ComprehensiveAnalysis>>;
}

/** Null, undefined, `{}` and `[]` count as absent. */
export const isEmptyPayload = (
  payload: AnalysisPayload | null | undefined,
): payload is null | undefined => {
  if (payload === null || payload === undefined) return true;
  return Array.isArray(payload) ? payload.length === 0 : Object.keys(payload).length === 0;
};

/**
 * Reads an engine's `overall_score`. An absent (or null) score counts as 0;
 * any other non-finite-number value is an aggregation fault.
 */
export const readOverallScore = (document: AnalysisDocument, engine: string): Result<number> => {
  const score = document.overall_score;
  if (score === undefined || score === null) return ok(0);
  if (typeof score === "number" && Number.isFinite(score)) return ok(score);
  return fail(
    new ServiceError(`${engine} returned a non-numeric overall_score`, "aggregation"),
  );
};

/** Unweighted mean of the two engine scores. */
export const combineScores = (
  whitepaper: AnalysisDocument,
  service: AnalysisDocument,
): Result<number> => {
  const whitepaperScore = readOverallScore(whitepaper, "whitepaper analysis");
  if (!whitepaperScore.ok) return whitepaperScore;
  const serviceScore = readOverallScore(service, "service analysis");
  if (!serviceScore.ok) return serviceScore;

  return ok((whitepaperScore.value + serviceScore.value) / 2);
};

export const createAnalysisOrchestrator = (
  deps: AnalysisOrchestratorDeps,
): AnalysisOrchestrator => {
  const { whitepaperAnalyzer, serviceAnalyzer, logger } = deps;

  const invoke = async (
    analyzer: Analyzer,
    payload: AnalysisPayload,
    targets: RecoveryTargets,
  ): Promise<Result<AnalysisDocument>> => {
    const start = Date.now();
    try {
      const document = await analyzer.analyze(payload, targets);
      logger.debug("Analysis complete", { analyzer: analyzer.name, durationMs: Date.now() - start });
      return ok(document);
    } catch (error) {
      logger.error("Analysis failed", toError(error), {
        analyzer: analyzer.name,
        rpoTarget: targets.rpoTarget,
        rtoTarget: targets.rtoTarget,
      });
      return fail(
        new ServiceError(
          `${analyzer.name} analysis failed: ${errorMessage(error)}`,
          "collaborator",
          error,
        ),
      );
    }
  };

  const targetsOf = (request: AnalysisRequest): RecoveryTargets => ({
    rpoTarget: request.rpoTarget,
    rtoTarget: request.rtoTarget,
  });

  const analyzeWhitepaper = async (request: AnalysisRequest): Promise<Result<AnalysisDocument>> => {
    if (isEmptyPayload(request.architectureData)) {
      return fail(validationError("architecture_data is required"));
    }
    return invoke(whitepaperAnalyzer, request.architectureData, targetsOf(request));
  };

  const analyzeServices = async (request: AnalysisRequest): Promise<Result<AnalysisDocument>> => {
    if (isEmptyPayload(request.services)) {
      return fail(validationError("services data is required"));
    }
    return invoke(serviceAnalyzer, request.services, targetsOf(request));
  };

  const analyzeComprehensive = async (
    request: AnalysisRequest,
  ): Promise<Result<ComprehensiveAnalysis>> => {
    const { architectureData, services } = request;
    const hasArchitecture = !isEmptyPayload(architectureData);
    const hasServices = !isEmptyPayload(services);

    if (!hasArchitecture && !hasServices) {
      return fail(validationError("Either architecture_data or services data is required"));
    }

    const targets = targetsOf(request);
    const [whitepaper, service] = await Promise.all([
      hasArchitecture && architectureData ? invoke(whitepaperAnalyzer, architectureData, targets) : null,
      hasServices && services ? invoke(serviceAnalyzer, services, targets) : null,
    ]);

    if (whitepaper && !whitepaper.ok) return whitepaper;
    if (service && !service.ok) return service;

    const results: ComprehensiveAnalysis = {};
    if (whitepaper) results.whitepaper_analysis = whitepaper.value;
    if (service) results.service_analysis = service.value;

    if (whitepaper && service) {
      const overall = combineScores(whitepaper.value, service.value);
      if (!overall.ok) {
        logger.error("Score aggregation failed", overall.error);
        return overall;
      }
      results.overall_score = overall.value;
    }

    return ok(results);
  };

  return { analyzeWhitepaper, analyzeServices, analyzeComprehensive };
};
