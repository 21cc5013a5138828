import { err, ok, type Result } from "neverthrow";

type HttpMethod = "GET" | "POST";

export type HttpRequest = {
  url: string;
  method: HttpMethod;
  headers?: Record<string, string>;
  body?: unknown;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  signal?: AbortSignal;
};

export type HttpClientError = {
  code:
    | "timeout"
    | "cancelled"
    | "transport_error"
    | "non_success_status"
    | "invalid_json";
  message: string;
  httpStatus?: number;
  retryable: boolean;
  cause?: unknown;
};

type BodyReader<T> = (response: Response) => Promise<Result<T, HttpClientError>>;

const readJson = async (
  response: Response,
): Promise<Result<unknown, HttpClientError>> => {
  try {
    const body: unknown = await response.json();
    return ok(body);
  } catch (jsonError) {
    return err({
      code: "invalid_json",
      message: "HTTP response body was not valid JSON.",
      retryable: false,
      cause: jsonError,
    });
  }
};

const readText = async (
  response: Response,
): Promise<Result<string, HttpClientError>> => ok(await response.text());

const readBytes = async (
  response: Response,
): Promise<Result<Uint8Array, HttpClientError>> =>
  ok(new Uint8Array(await response.arrayBuffer()));

/**
 * Centralizes HTTP IO so adapters share one timeout/retry/status parsing policy.
 */
export class HttpClient {
  /**
   * Executes JSON requests with bounded retries. The body comes back unvalidated.
   */
  async requestJson(
    request: HttpRequest,
  ): Promise<Result<unknown, HttpClientError>> {
    return this.withRetries(request, readJson);
  }

  async requestText(
    request: HttpRequest,
  ): Promise<Result<string, HttpClientError>> {
    return this.withRetries(request, readText);
  }

  async requestBytes(
    request: HttpRequest,
  ): Promise<Result<Uint8Array, HttpClientError>> {
    return this.withRetries(request, readBytes);
  }

  private async withRetries<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    const maxAttempts = request.retries + 1;

    for (let attempt = 1; attempt <= maxAttempts; attempt += 1) {
      const response = await this.performRequest(request, readBody);
      if (response.isOk()) {
        return response;
      }

      const failure = response.error;
      const hasAttemptsLeft = attempt < maxAttempts;
      if (!failure.retryable || !hasAttemptsLeft) {
        return response;
      }

      await this.delay(request.retryDelayMs * attempt);
    }

    return err({
      code: "transport_error",
      message: "HTTP request exhausted retry attempts.",
      retryable: false,
    });
  }

  private async performRequest<T>(
    request: HttpRequest,
    readBody: BodyReader<T>,
  ): Promise<Result<T, HttpClientError>> {
    if (request.signal?.aborted) {
      return err({
        code: "cancelled",
        message: "HTTP request was cancelled by the caller.",
        retryable: false,
      });
    }

    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), request.timeoutMs);
    const onCallerAbort = () => controller.abort();
    request.signal?.addEventListener("abort", onCallerAbort, { once: true });

    try {
      const response = await fetch(request.url, {
        method: request.method,
        headers: request.headers,
        body:
          request.body === undefined ? undefined : JSON.stringify(request.body),
        signal: controller.signal,
      });

      if (!response.ok) {
        const retryable = response.status === 429 || response.status >= 500;

        return err({
          code: "non_success_status",
          message: `HTTP request failed with status ${response.status}.`,
          httpStatus: response.status,
          retryable,
        });
      }

      return await readBody(response);
    } catch (error) {
      const isAbortError =
        error instanceof DOMException && error.name === "AbortError";

      if (isAbortError && request.signal?.aborted) {
        return err({
          code: "cancelled",
          message: "HTTP request was cancelled by the caller.",
          retryable: false,
          cause: error,
        });
      }

      if (isAbortError) {
        return err({
          code: "timeout",
          message: "HTTP request timed out.",
          retryable: true,
          cause: error,
        });
      }

      return err({
        code: "transport_error",
        message:
          error instanceof Error ? error.message : "HTTP transport failed.",
        retryable: true,
        cause: error,
      });
    } finally {
      clearTimeout(timeout);
      request.signal?.removeEventListener("abort", onCallerAbort);
    }
  }

  private async delay(ms: number): Promise<void> {
    await new Promise((resolve) => {
      setTimeout(resolve, ms);
    });
  }
}
