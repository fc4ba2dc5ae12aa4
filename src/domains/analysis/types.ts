/**
 * Analysis request/result types.
 *
 * Engine documents are opaque to this service apart from their optional
 * numeric `overall_score`.
 */

export const DEFAULT_RPO_TARGET = "1 hour";
export const DEFAULT_RTO_TARGET = "4 hours";

/** Structured document handed to an engine unchanged */
export type AnalysisPayload = Record<string, unknown> | unknown[];

/** Result document returned by an engine */
export type AnalysisDocument = Record<string, unknown>;

export interface RecoveryTargets {
  /** Recovery point objective, e.g. "1 hour" */
  rpoTarget: string;
  /** Recovery time objective, e.g. "4 hours" */
  rtoTarget: string;
}

export interface AnalysisRequest extends RecoveryTargets {
  architectureData?: AnalysisPayload | null;
  services?: AnalysisPayload | null;
}

export interface Analyzer {
  name: string;
  analyze: (payload: AnalysisPayload, targets: RecoveryTargets) => Promise<AnalysisDocument>;
}

/** Combined result; `overall_score` is present only when both engines ran */
export interface ComprehensiveAnalysis {
  whitepaper_analysis?: AnalysisDocument;
  service_analysis?: AnalysisDocument;
  overall_score?: number;
}
