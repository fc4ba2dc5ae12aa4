import { Hono } from "hono";

import { type AnalysisOrchestrator, parseAnalysisRequest } from "@/domains/analysis";
import { validationError } from "@/lib/errors";
import { type Result, fail, ok } from "@/lib/result";

import { errorResponse } from "../responses";

const readJsonBody = async (req: Request): Promise<Result<unknown>> => {
  try {
    const body: unknown = await req.json();
    return ok(body);
  } catch {
    return fail(validationError("Request body must be valid JSON"));
  }
};

export const createAnalyzeRoute = (orchestrator: AnalysisOrchestrator): Hono => {
  const analyze = new Hono();

  analyze.post("/whitepaper", async (c) => {
    const body = await readJsonBody(c.req.raw);
    if (!body.ok) return errorResponse(c, body.error);
    const request = parseAnalysisRequest(body.value);
    if (!request.ok) return errorResponse(c, request.error);

    const result = await orchestrator.analyzeWhitepaper(request.value);
    if (!result.ok) return errorResponse(c, result.error);
    return c.json({ status: "success", analysis_result: result.value });
  });

  analyze.post("/services", async (c) => {
    const body = await readJsonBody(c.req.raw);
    if (!body.ok) return errorResponse(c, body.error);
    const request = parseAnalysisRequest(body.value);
    if (!request.ok) return errorResponse(c, request.error);

    const result = await orchestrator.analyzeServices(request.value);
    if (!result.ok) return errorResponse(c, result.error);
    return c.json({ status: "success", analysis_result: result.value });
  });

  analyze.post("/comprehensive", async (c) => {
    const body = await readJsonBody(c.req.raw);
    if (!body.ok) return errorResponse(c, body.error);
    const request = parseAnalysisRequest(body.value);
    if (!request.ok) return errorResponse(c, request.error);

    const result = await orchestrator.analyzeComprehensive(request.value);
    if (!result.ok) return errorResponse(c, result.error);
    return c.json({ status: "success", analysis_results: result.value });
  });

  return analyze;
};
