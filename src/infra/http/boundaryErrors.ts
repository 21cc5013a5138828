import type {
  AppBoundaryError,
  AppBoundaryErrorCode,
  AppBoundarySource,
} from "../../core/entities/appError";
import type { HttpClientError } from "./httpClient";

const boundaryCode = (error: HttpClientError): AppBoundaryErrorCode => {
  if (error.httpStatus === 429) {
    return "rate_limited";
  }

  if (error.httpStatus === 401 || error.httpStatus === 403) {
    return "auth_invalid";
  }

  switch (error.code) {
    case "timeout":
    case "cancelled":
    case "transport_error":
    case "invalid_json":
      return error.code;
    default:
      return "provider_error";
  }
};

/**
 * Lifts an HTTP transport failure into the boundary taxonomy, keeping status and cause.
 */
export const toBoundaryError = (
  source: AppBoundarySource,
  provider: string,
  error: HttpClientError,
): AppBoundaryError => ({
  source,
  code: boundaryCode(error),
  provider,
  message: error.message,
  retryable: error.retryable,
  httpStatus: error.httpStatus,
  cause: error.cause,
});
