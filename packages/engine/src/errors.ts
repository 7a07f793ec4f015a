import type { FailureKind } from "@odflow/types";

/** HTTP status carried by each failure kind */
const STATUS_BY_KIND: Record<FailureKind, number> = {
  InvalidTimeRange: 400,
  InvalidIdFilter: 400,
  InvalidFillValue: 400,
  EmptyQuery: 400,
  LengthMismatch: 400,
  NoValidPairs: 400,
  ValidationFailed: 422,
  UpstreamUnavailable: 503,
  Internal: 500,
};

/**
 * Error raised by the query engine.
 *
 * `status` is read by the server's error handler, so engine code never
 * needs to know about HTTP.
 */
export class OdflowError extends Error {
  readonly kind: FailureKind;
  readonly status: number;

  constructor(kind: FailureKind, message: string) {
    super(message);
    this.name = "OdflowError";
    this.kind = kind;
    this.status = STATUS_BY_KIND[kind];
  }
}

export function isOdflowError(err: unknown): err is OdflowError {
  return err instanceof OdflowError;
}

export function statusForKind(kind: FailureKind): number {
  return STATUS_BY_KIND[kind];
}
