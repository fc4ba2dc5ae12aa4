import type { Context } from "hono";

import { type ServiceError, httpStatusForKind } from "@/lib/errors";

/** Error envelope shared by every route: `{ status: "error", kind, error }` */
export const errorResponse = (c: Context, error: ServiceError): Response =>
  c.json(
    { status: "error", kind: error.kind, error: error.message },
    httpStatusForKind(error.kind),
  );
