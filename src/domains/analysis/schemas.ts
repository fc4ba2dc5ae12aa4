import * as v from "valibot";

import { type ServiceError, validationError } from "@/lib/errors";
import { type Result, fail, ok } from "@/lib/result";

import { type AnalysisRequest, DEFAULT_RPO_TARGET, DEFAULT_RTO_TARGET } from "./types";

const payloadSchema = v.nullish(v.union([v.array(v.unknown()), v.record(v.string(), v.unknown())]));

export const analysisRequestSchema = v.object({
  architecture_data: payloadSchema,
  services: payloadSchema,
  rpo_target: v.nullish(v.string(), DEFAULT_RPO_TARGET),
  rto_target: v.nullish(v.string(), DEFAULT_RTO_TARGET),
});

export const analysisDocumentSchema = v.record(v.string(), v.unknown());

const describeIssues = (issues: readonly v.BaseIssue<unknown>[]): ServiceError => {
  const details = issues.map((issue) => {
    const path = v.getDotPath(issue);
    return path ? `${path}: ${issue.message}` : issue.message;
  });
  return validationError(`Invalid request body: ${details.join("; ")}`);
};

/**
 * Wire body → AnalysisRequest. Missing targets fall back to the defaults;
 * wrongly typed fields are validation errors.
 */
export const parseAnalysisRequest = (body: unknown): Result<AnalysisRequest> => {
  const parsed = v.safeParse(analysisRequestSchema, body);
  if (!parsed.success) {
    return fail(describeIssues(parsed.issues));
  }

  const { architecture_data, services, rpo_target, rto_target } = parsed.output;
  return ok({
    architectureData: architecture_data,
    services,
    rpoTarget: rpo_target,
    rtoTarget: rto_target,
  });
};
