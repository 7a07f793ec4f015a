import { isAxiosError } from "axios";
import { isFailureKind, type ErrorBody, type FailureKind } from "@odflow/types";

/** Failure of an API call, classified with the server's taxonomy */
export class ApiError extends Error {
  readonly kind: FailureKind;
  /** HTTP status, or null when no response arrived */
  readonly status: number | null;
  readonly details?: ErrorBody["details"];

  constructor(
    kind: FailureKind,
    status: number | null,
    message: string,
    details?: ErrorBody["details"],
  ) {
    super(message);
    this.name = "ApiError";
    this.kind = kind;
    this.status = status;
    this.details = details;
  }
}

function isErrorBody(data: unknown): data is ErrorBody {
  return (
    typeof data === "object" &&
    data !== null &&
    "error" in data &&
    typeof data.error === "string" &&
    "kind" in data &&
    isFailureKind(data.kind)
  );
}

const GATEWAY_STATUSES = new Set([502, 503, 504]);

export function toApiError(err: unknown): ApiError {
  if (err instanceof ApiError) return err;

  if (isAxiosError(err)) {
    const response = err.response;
    if (!response) {
      return new ApiError("UpstreamUnavailable", null, `server unreachable: ${err.message}`);
    }
    if (isErrorBody(response.data)) {
      return new ApiError(
        response.data.kind,
        response.status,
        response.data.error,
        response.data.details,
      );
    }
    const kind = GATEWAY_STATUSES.has(response.status) ? "UpstreamUnavailable" : "Internal";
    return new ApiError(kind, response.status, err.message);
  }

  return new ApiError("Internal", null, err instanceof Error ? err.message : String(err));
}
