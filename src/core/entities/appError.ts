/**
 * Describes canonical error categories used at clean-architecture boundaries.
 */
export type AppBoundaryErrorCode =
  | "timeout"
  | "cancelled"
  | "rate_limited"
  | "auth_invalid"
  | "config_invalid"
  | "provider_error"
  | "transport_error"
  | "malformed_response"
  | "invalid_json"
  | "validation_error";

export type AppBoundarySource =
  | "news"
  | "summarizer"
  | "sentiment"
  | "translation"
  | "speech"
  | "storage";

/**
 * Describes a normalized boundary failure while preserving adapter/provider provenance.
 */
export type AppBoundaryError = {
  source: AppBoundarySource;
  code: AppBoundaryErrorCode;
  provider: string;
  message: string;
  retryable: boolean;
  httpStatus?: number;
  cause?: unknown;
};

/**
 * Failures that escape the pipeline; every other failure is absorbed by a stage fallback.
 */
export type PipelineFailureCode = "invalid_input" | "internal_error" | "cancelled";

export type PipelineFailure = {
  code: PipelineFailureCode;
  message: string;
  cause?: unknown;
};
