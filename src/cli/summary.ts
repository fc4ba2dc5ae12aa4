/**
 * Console rendering for the readiness CLI. Every function returns lines so
 * the caller decides where they go.
 */

import type { AggregateReport, CheckResult } from "@/domains/readiness";

const RULE = "=".repeat(60);
const THIN_RULE = "-".repeat(60);

export const formatSeconds = (ms: number): string => `${(ms / 1000).toFixed(2)}s`;

export const formatBanner = (startedAt: Date): string[] => [
  RULE,
  "Resilience Agent: Production Readiness Validation",
  `Started: ${startedAt.toISOString()}`,
  RULE,
];

export const formatSectionHeader = (title: string): string[] => ["", title, THIN_RULE];

export const formatCheckLine = (result: CheckResult, label: string): string[] => {
  const badge = result.success ? "✅ PASS" : "❌ FAIL";
  const duration = result.durationMs > 0 ? ` (${formatSeconds(result.durationMs)})` : "";
  const headline = `${badge} ${label}${duration}`;
  return result.message ? [headline, `   ${result.message}`] : [headline];
};

export const formatSummary = (report: AggregateReport): string[] => {
  const results = Object.values(report.checks);
  const failed = results.filter((result) => !result.success);

  const lines = [
    "",
    RULE,
    "VALIDATION SUMMARY",
    RULE,
    `Checks passed: ${results.length - failed.length}/${results.length}`,
    `Total duration: ${formatSeconds(report.totalDurationMs)}`,
  ];

  if (failed.length > 0) {
    lines.push("Failed checks:");
    for (const result of failed) {
      lines.push(`  - ${result.name}: ${result.message}`);
    }
  }

  lines.push(
    report.overallSuccess ? "Status: ✅ PRODUCTION READY" : "Status: ❌ NOT READY FOR PRODUCTION",
  );
  return lines;
};
