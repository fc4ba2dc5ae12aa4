/**
 * Service error taxonomy.
 *
 * Every externally visible failure carries a stable `kind` so callers can tell
 * fix-and-resubmit (client) failures from retryable (server) ones.
 */

export type ErrorKind =
  /** Caller-supplied input failed a precondition */
  | "validation"
  /** An analysis engine, monitor or credential probe failed */
  | "collaborator"
  /** Combining collaborator results failed */
  | "aggregation"
  /** A monitoring subsystem failed to start */
  | "lifecycle";

export class ServiceError extends Error {
  public override readonly name = "ServiceError";

  constructor(
    message: string,
    public readonly kind: ErrorKind,
    public override readonly cause?: unknown,
  ) {
    super(message, { cause });
  }
}

export type ErrorStatusCode = 400 | 500 | 503;

const STATUS_BY_KIND: Record<ErrorKind, ErrorStatusCode> = {
  validation: 400,
  collaborator: 500,
  aggregation: 500,
  lifecycle: 503,
};

export const httpStatusForKind = (kind: ErrorKind): ErrorStatusCode => STATUS_BY_KIND[kind];

export const toError = (error: unknown): Error =>
  error instanceof Error ? error : new Error(String(error));

export const errorMessage = (error: unknown): string =>
  error instanceof Error ? error.message : String(error);

export const validationError = (message: string): ServiceError =>
  new ServiceError(message, "validation");
