/**
 * Failure taxonomy shared by the engine, the server and the API clients.
 */

export const FAILURE_KINDS = [
  "InvalidTimeRange",
  "InvalidIdFilter",
  "InvalidFillValue",
  "EmptyQuery",
  "LengthMismatch",
  "NoValidPairs",
  "UpstreamUnavailable",
  "ValidationFailed",
  "Internal",
] as const;

export type FailureKind = (typeof FAILURE_KINDS)[number];

export function isFailureKind(value: unknown): value is FailureKind {
  return FAILURE_KINDS.some((kind) => kind === value);
}

/** Uniform error body returned by the API */
export interface ErrorBody {
  error: string;
  kind: FailureKind;
  details?: Record<string, { message: string; value?: unknown }>;
}
