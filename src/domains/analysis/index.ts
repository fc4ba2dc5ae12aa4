export {
  combineScores,
  createAnalysisOrchestrator,
  isEmptyPayload,
  readOverallScore,
  type AnalysisOrchestrator,
  type AnalysisOrchestratorDeps,
} from "./orchestrator";
export { analysisDocumentSchema, analysisRequestSchema, parseAnalysisRequest } from "./schemas";
export * from "./types";
