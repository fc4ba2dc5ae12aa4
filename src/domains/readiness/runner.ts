import { errorMessage } from "@/lib/errors";

import type { CheckFn, CheckResult } from "./types";

export interface RunCheckOptions {
  /** Monotonic clock in milliseconds */
  now?: () => number;
}

/**
 * Runs a single check and normalizes the outcome.
 *
 * Never rejects: a thrown error or rejected promise becomes a failed
 * CheckResult carrying the error text. Timing covers only the check call.
 */
export const runCheck = async (
  name: string,
  check: CheckFn,
  options: RunCheckOptions = {},
): Promise<CheckResult> => {
  const now = options.now ?? (() => performance.now());
  const start = now();

  let success: boolean;
  let message: string;
  try {
    const outcome = await check();
    success = outcome.success;
    message = outcome.message;
  } catch (error) {
    success = false;
    message = `Error running check: ${errorMessage(error)}`;
  }

  const durationMs = Math.max(0, now() - start);

  return Object.freeze({ name, success, message, durationMs });
};
