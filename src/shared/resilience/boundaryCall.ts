import { err, type Result } from "neverthrow";
import type {
  AppBoundaryError,
  AppBoundarySource,
} from "../../core/entities/appError";
import { logger } from "../logger/logger";

export type BoundaryCallPolicy = {
  source: AppBoundarySource;
  provider: string;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type BoundaryOperation<T> = (
  signal: AbortSignal,
) => Promise<Result<T, AppBoundaryError>>;

/**
 * A value that may have been produced by a fallback; `failure` is set when it was.
 */
export type Degradable<T> = {
  value: T;
  failure?: AppBoundaryError;
};

const boundaryError = (
  policy: BoundaryCallPolicy,
  code: AppBoundaryError["code"],
  message: string,
  retryable: boolean,
  cause?: unknown,
): AppBoundaryError => ({
  source: policy.source,
  code,
  provider: policy.provider,
  message,
  retryable,
  cause,
});

const delay = async (ms: number): Promise<void> => {
  await new Promise((resolve) => {
    setTimeout(resolve, ms);
  });
};

const attemptOnce = async <T>(
  policy: BoundaryCallPolicy,
  operation: BoundaryOperation<T>,
  callerSignal: AbortSignal | undefined,
): Promise<Result<T, AppBoundaryError>> => {
  if (callerSignal?.aborted) {
    return err(
      boundaryError(policy, "cancelled", "Call cancelled by caller.", false),
    );
  }

  const controller = new AbortController();
  const onCallerAbort = () => controller.abort();
  callerSignal?.addEventListener("abort", onCallerAbort, { once: true });

  let timer: ReturnType<typeof setTimeout> | undefined;

  // Resolves on timeout or caller abort even when the operation ignores its signal.
  const guard = new Promise<Result<T, AppBoundaryError>>((resolve) => {
    controller.signal.addEventListener(
      "abort",
      () => {
        if (callerSignal?.aborted) {
          resolve(
            err(
              boundaryError(
                policy,
                "cancelled",
                "Call cancelled by caller.",
                false,
              ),
            ),
          );
        }
      },
      { once: true },
    );

    timer = setTimeout(() => {
      controller.abort();
      resolve(
        err(
          boundaryError(
            policy,
            "timeout",
            `Call exceeded ${policy.timeoutMs}ms.`,
            true,
          ),
        ),
      );
    }, policy.timeoutMs);
  });

  const running = Promise.resolve()
    .then(() => operation(controller.signal))
    .catch((error: unknown) =>
      err(
        boundaryError(
          policy,
          "provider_error",
          error instanceof Error ? error.message : String(error),
          false,
          error,
        ),
      ),
    );

  try {
    return await Promise.race([running, guard]);
  } finally {
    clearTimeout(timer);
    callerSignal?.removeEventListener("abort", onCallerAbort);
  }
};

/**
 * Runs one external call under a timeout, bounded retries for retryable failures,
 * and the caller's cancellation signal. Thrown errors come back as `Err`.
 */
export const callBoundary = async <T>(
  policy: BoundaryCallPolicy,
  operation: BoundaryOperation<T>,
  callerSignal?: AbortSignal,
): Promise<Result<T, AppBoundaryError>> => {
  const maxAttempts = policy.retries + 1;
  let result = await attemptOnce(policy, operation, callerSignal);

  for (let attempt = 2; attempt <= maxAttempts; attempt += 1) {
    if (result.isOk() || !result.error.retryable || callerSignal?.aborted) {
      break;
    }

    await delay(policy.retryDelayMs * (attempt - 1));
    result = await attemptOnce(policy, operation, callerSignal);
  }

  if (result.isErr()) {
    logger.warn(
      {
        source: policy.source,
        provider: policy.provider,
        code: result.error.code,
        reason: result.error.message,
      },
      "Boundary call failed",
    );
  }

  return result;
};

/**
 * Collapses a boundary result into a value, substituting the fallback on failure.
 */
export const withFallback = async <T>(
  pending: Promise<Result<T, AppBoundaryError>>,
  fallback: (error: AppBoundaryError) => T,
): Promise<Degradable<T>> => {
  const result = await pending;

  return result.match<Degradable<T>>(
    (value) => ({ value }),
    (error) => ({ value: fallback(error), failure: error }),
  );
};
