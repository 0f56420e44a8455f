import type { ErrorRequestHandler } from "express";
import { AllergyError, type AllergyErrorCode } from "../errors/AllergyErrors";

// Global error handler.
// Domain errors map to client statuses with their field errors; anything else
// is logged and returned as 500 (message hidden in production).

const STATUS_BY_CODE: Readonly<Record<AllergyErrorCode, number>> = {
  SHAPE_VIOLATION: 400,
  TEMPORAL_VIOLATION: 400,
  REFERENTIAL_STATE_VIOLATION: 400,
  UNIQUENESS_VIOLATION: 409,
  NOT_FOUND: 404,
  CATALOG_CONFLICT: 500,
};

export interface ErrorBody {
  error: string;
  code: string;
  fieldErrors?: Readonly<Record<string, readonly string[]>>;
}

export function createErrorHandler(options: { readonly verbose: boolean }): ErrorRequestHandler {
  return (err: unknown, req, res, _next): void => {
    if (err instanceof AllergyError) {
      const status = STATUS_BY_CODE[err.code];
      if (status >= 500) console.error(`[Allergies] ${req.method} ${req.path} failed:`, err.message);
      const body: ErrorBody = {
        error: err.message,
        code: err.code,
        ...(Object.keys(err.fieldErrors).length ? { fieldErrors: err.fieldErrors } : {}),
      };
      res.status(status).json(body);
      return;
    }

    // Body parser errors carry their own status (e.g. malformed JSON).
    if (err instanceof SyntaxError && "status" in err && err.status === 400) {
      res.status(400).json({ error: "Malformed JSON body.", code: "BAD_REQUEST" });
      return;
    }

    const message = err instanceof Error ? err.message : String(err);
    console.error(`[Allergies Server Error] ${req.method} ${req.path}:`, message);
    res.status(500).json({
      error: options.verbose ? message || "Internal server error." : "Internal server error.",
      code: "INTERNAL_ERROR",
    });
  };
}
