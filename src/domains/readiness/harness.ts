import type { Logger } from "@/lib/logger";

import { buildAggregateReport } from "./report";
import { runCheck } from "./runner";
import type { AggregateReport, CheckDefinition, CheckResult } from "./types";

export interface ValidationOptions {
  logger?: Logger;
  /** Called after each check, in execution order */
  onResult?: (result: CheckResult, definition: CheckDefinition) => void;
  /** Monotonic clock in milliseconds */
  now?: () => number;
  /** Report creation time */
  timestamp?: () => Date;
}

const assertUniqueNames = (checks: readonly CheckDefinition[]): void => {
  const seen = new Set<string>();
  for (const check of checks) {
    if (seen.has(check.name)) {
      throw new Error(`Duplicate check name: ${check.name}`);
    }
    seen.add(check.name);
  }
};

/**
 * Runs every check in order and aggregates the results.
 *
 * Checks are isolated by {@link runCheck}, so a failing or throwing check
 * never stops the ones after it.
 */
export const runValidation = async (
  checks: readonly CheckDefinition[],
  options: ValidationOptions = {},
): Promise<AggregateReport> => {
  const { logger, onResult } = options;
  const now = options.now ?? (() => performance.now());

  assertUniqueNames(checks);

  const start = now();
  const results: CheckResult[] = [];

  for (const definition of checks) {
    logger?.debug("Running check", { check: definition.name });
    const result = await runCheck(definition.name, definition.run, { now });
    results.push(result);

    if (result.success) {
      logger?.debug("Check passed", { check: result.name, durationMs: result.durationMs });
    } else {
      logger?.warn("Check failed", { check: result.name, message: result.message });
    }
    onResult?.(result, definition);
  }

  const report = buildAggregateReport(results, {
    totalDurationMs: Math.max(0, now() - start),
    timestamp: options.timestamp?.(),
  });

  logger?.info("Validation complete", {
    overallSuccess: report.overallSuccess,
    failed: results.filter((result) => !result.success).map((result) => result.name),
  });

  return report;
};
