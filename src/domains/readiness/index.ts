export { runValidation, type ValidationOptions } from "./harness";
export {
  buildAggregateReport,
  defaultReportFilename,
  exitCodeFor,
  saveReport,
  toReportDocument,
  type FileWriter,
} from "./report";
export { runCheck, type RunCheckOptions } from "./runner";
export type {
  AggregateReport,
  CheckDefinition,
  CheckFn,
  CheckOutcome,
  CheckResult,
  ReportDocument,
} from "./types";
export * from "./checks";
