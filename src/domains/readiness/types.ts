/**
 * Readiness check types.
 *
 * A check is an atomic, named, timed pass/fail probe of a deployment
 * precondition. Health checks run by the monitoring subsystem reuse the same
 * shapes.
 */

/** What a check function reports when it completes normally. */
export interface CheckOutcome {
  success: boolean;
  message: string;
}

/** A check function takes no arguments; throwing or rejecting counts as a failure. */
export type CheckFn = () => CheckOutcome | Promise<CheckOutcome>;

export interface CheckDefinition {
  /** Identifier, unique within a run; used as the report key */
  name: string;
  /** Human-readable label for terminal output */
  label: string;
  run: CheckFn;
}

export interface CheckResult {
  readonly name: string;
  readonly success: boolean;
  readonly message: string;
  /** Time spent inside the check function only */
  readonly durationMs: number;
}

export interface AggregateReport {
  /** Logical AND of every check's success */
  readonly overallSuccess: boolean;
  /** Keyed by check name, in execution order */
  readonly checks: Readonly<Record<string, CheckResult>>;
  /** Wall-clock span of the whole run */
  readonly totalDurationMs: number;
  /** ISO-8601 creation time */
  readonly timestamp: string;
}

/** Persisted artifact layout. Durations are in seconds. */
export interface ReportDocument {
  validation_timestamp: string;
  overall_success: boolean;
  production_ready: boolean;
  results: {
    checks: Record<string, { success: boolean; message: string; duration: number }>;
    total_duration: number;
  };
}
