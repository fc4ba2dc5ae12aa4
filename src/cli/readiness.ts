/**
 * Readiness CLI: runs the deployment prerequisite checks, prints a report,
 * optionally saves it, and returns the process exit code.
 */

import yargs from "yargs";

import {
  type CheckDefinition,
  type FileWriter,
  createStandardChecks,
  createStsCallerIdentityProbe,
  defaultReportFilename,
  exitCodeFor,
  runValidation,
  saveReport,
} from "@/domains/readiness";
import { errorMessage, toError } from "@/lib/errors";
import type { Logger } from "@/lib/logger";

import { formatBanner, formatCheckLine, formatSectionHeader, formatSummary } from "./summary";

export interface ReadinessCliOptions {
  saveReport: boolean;
  reportFile?: string;
  verbose: boolean;
}

export const parseReadinessArgs = (args: readonly string[]): ReadinessCliOptions => {
  const argv = yargs([...args])
    .scriptName("validate-readiness")
    .usage("$0 [options]")
    .option("save-report", {
      type: "boolean",
      describe: "Write the readiness report to a JSON file",
      default: false,
    })
    .option("report-file", {
      type: "string",
      describe: "Report file name (default: readiness_report_<timestamp>.json)",
    })
    .option("verbose", {
      type: "boolean",
      describe: "Log debug output",
      default: false,
    })
    .strict()
    .help()
    .parseSync();

  return {
    saveReport: argv["save-report"],
    reportFile: argv["report-file"],
    verbose: argv.verbose,
  };
};

export interface ReadinessCliDeps {
  logger: Logger;
  print?: (line: string) => void;
  checks?: readonly CheckDefinition[];
  writeReport?: FileWriter;
  /** Wall clock for the banner, report timestamp and default file name */
  clock?: () => Date;
  /** Aborting stops waiting for the checks and exits as interrupted */
  signal?: AbortSignal;
  awsRegion?: string;
}

const INTERRUPTED = Symbol("interrupted");

const whenAborted = (signal: AbortSignal | undefined): Promise<typeof INTERRUPTED> =>
  new Promise((resolve) => {
    if (!signal) return;
    if (signal.aborted) {
      resolve(INTERRUPTED);
      return;
    }
    signal.addEventListener("abort", () => resolve(INTERRUPTED), { once: true });
  });

export const runReadinessCli = async (
  options: ReadinessCliOptions,
  deps: ReadinessCliDeps,
): Promise<0 | 1> => {
  const { logger } = deps;
  const print = deps.print ?? ((line: string) => console.log(line));
  const clock = deps.clock ?? (() => new Date());
  const checks =
    deps.checks ??
    createStandardChecks({ identityProbe: createStsCallerIdentityProbe(deps.awsRegion) });

  const printAll = (lines: readonly string[]): void => {
    for (const line of lines) print(line);
  };

  try {
    printAll(formatBanner(clock()));
    printAll(formatSectionHeader("Prerequisite Checks"));

    const outcome = await Promise.race([
      runValidation(checks, {
        logger,
        timestamp: clock,
        onResult: (result, definition) => printAll(formatCheckLine(result, definition.label)),
      }),
      whenAborted(deps.signal),
    ]);

    if (outcome === INTERRUPTED) {
      print("");
      print("Validation interrupted by user");
      logger.warn("Validation interrupted");
      return 1;
    }

    printAll(formatSummary(outcome));

    if (options.saveReport) {
      const filename = options.reportFile ?? defaultReportFilename(clock());
      await saveReport(outcome, filename, deps.writeReport);
      print("");
      print(`Report saved to ${filename}`);
      logger.info("Readiness report saved", { filename });
    }

    return exitCodeFor(outcome);
  } catch (error) {
    logger.error("Validation failed", toError(error));
    print("");
    print(`Validation failed with error: ${errorMessage(error)}`);
    return 1;
  }
};
