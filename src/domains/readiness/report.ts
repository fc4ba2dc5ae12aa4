import { writeFile } from "node:fs/promises";

import type { AggregateReport, CheckResult, ReportDocument } from "./types";

export interface BuildReportOptions {
  totalDurationMs: number;
  timestamp?: Date;
}

/**
 * Combines check results into one verdict. The result list order is kept as
 * the report's key order.
 */
export const buildAggregateReport = (
  results: readonly CheckResult[],
  options: BuildReportOptions,
): AggregateReport => {
  const checks: Record<string, CheckResult> = {};
  for (const result of results) {
    if (result.name in checks) {
      throw new Error(`Duplicate check name in report: ${result.name}`);
    }
    checks[result.name] = result;
  }

  return Object.freeze({
    overallSuccess: results.every((result) => result.success),
    checks: Object.freeze(checks),
    totalDurationMs: options.totalDurationMs,
    timestamp: (options.timestamp ?? new Date()).toISOString(),
  });
};

/** 0 when every check passed, 1 otherwise. */
export const exitCodeFor = (report: AggregateReport): 0 | 1 => (report.overallSuccess ? 0 : 1);

const toSeconds = (ms: number): number => ms / 1000;

export const toReportDocument = (report: AggregateReport): ReportDocument => {
  const checks: ReportDocument["results"]["checks"] = {};
  for (const [name, result] of Object.entries(report.checks)) {
    checks[name] = {
      success: result.success,
      message: result.message,
      duration: toSeconds(result.durationMs),
    };
  }

  return {
    validation_timestamp: report.timestamp,
    overall_success: report.overallSuccess,
    production_ready: report.overallSuccess,
    results: {
      checks,
      total_duration: toSeconds(report.totalDurationMs),
    },
  };
};

const pad = (value: number): string => String(value).padStart(2, "0");

/** `readiness_report_YYYYMMDD_HHMMSS.json`, in local time. */
export const defaultReportFilename = (date: Date = new Date()): string => {
  const day = `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`;
  return `readiness_report_${day}_${time}.json`;
};

export type FileWriter = (path: string, contents: string) => Promise<void>;

const writeUtf8: FileWriter = (path, contents) => writeFile(path, contents, "utf8");

export const saveReport = async (
  report: AggregateReport,
  filename: string,
  write: FileWriter = writeUtf8,
): Promise<string> => {
  await write(filename, `${JSON.stringify(toReportDocument(report), null, 2)}\n`);
  return filename;
};
