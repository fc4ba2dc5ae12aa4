import type { ServiceError } from "./errors";

/**
 * Outcome of an operation that can fail with a typed {@link ServiceError}.
 */
export type Result<T> = { ok: true; value: T } | { ok: false; error: ServiceError };

export const ok = <T>(value: T): Result<T> => ({ ok: true, value });

export const fail = <T = never>(error: ServiceError): Result<T> => ({ ok: false, error });
