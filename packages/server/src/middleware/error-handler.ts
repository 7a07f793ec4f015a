import type { Request, Response, NextFunction } from "express";
import { ValidateError } from "@tsoa/runtime";
import { isOdflowError, type ErrorBody } from "@odflow/engine";

function statusOf(err: Error): number | undefined {
  return "status" in err && typeof err.status === "number" ? err.status : undefined;
}

export function errorHandler(
  err: unknown,
  _req: Request,
  res: Response,
  next: NextFunction,
): void {
  if (err instanceof ValidateError) {
    console.warn(`[validation] ${JSON.stringify(err.fields)}`);
    const body: ErrorBody = {
      error: "Validation failed",
      kind: "ValidationFailed",
      details: err.fields,
    };
    res.status(422).json(body);
    return;
  }

  if (isOdflowError(err)) {
    if (err.status >= 500) {
      console.error(`[error] ${err.kind}: ${err.message}`);
    } else {
      console.warn(`[error] ${err.kind}: ${err.message}`);
    }
    const body: ErrorBody = { error: err.message, kind: err.kind };
    res.status(err.status).json(body);
    return;
  }

  if (err instanceof Error) {
    // Framework errors (e.g. malformed JSON bodies) carry their own 4xx status
    const status = statusOf(err) ?? 500;
    console.error(`[error] ${err.message}`);
    const body: ErrorBody = {
      error: err.message,
      kind: status < 500 ? "ValidationFailed" : "Internal",
    };
    res.status(status).json(body);
    return;
  }

  next(err);
}
