import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { SpeechSynthesisPort } from "../../core/ports/outboundPorts";
import { HttpClient } from "../http/httpClient";
import { toBoundaryError } from "../http/boundaryErrors";

const MAX_TEXT_CHARS = 200;

/**
 * Google Translate's speech endpoint. Returns MP3 bytes for at most 200 characters per call.
 */
export class GoogleTtsClient implements SpeechSynthesisPort {
  readonly provider = "google-tts";
  readonly contentType = "audio/mpeg" as const;

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 15_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  async synthesize(
    text: string,
    language: string,
    signal?: AbortSignal,
  ): Promise<Result<Uint8Array, AppBoundaryError>> {
    if (text.length > MAX_TEXT_CHARS) {
      return err({
        source: "speech",
        code: "validation_error",
        provider: this.provider,
        message: `Text too long for one synthesis call (${text.length} > ${MAX_TEXT_CHARS} chars).`,
        retryable: false,
      });
    }

    const url = new URL("/translate_tts", this.baseUrl);
    url.searchParams.set("ie", "UTF-8");
    url.searchParams.set("client", "tw-ob");
    url.searchParams.set("tl", language);
    url.searchParams.set("q", text);
    url.searchParams.set("total", "1");
    url.searchParams.set("idx", "0");
    url.searchParams.set("textlen", String(text.length));

    const response = await this.httpClient.requestBytes({
      url: url.toString(),
      method: "GET",
      headers: { Referer: "http://translate.google.com/" },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
      signal,
    });
    if (response.isErr()) {
      return err(toBoundaryError("speech", this.provider, response.error));
    }

    if (response.value.byteLength === 0) {
      return err({
        source: "speech",
        code: "malformed_response",
        provider: this.provider,
        message: "Speech endpoint returned no audio.",
        retryable: true,
      });
    }

    return ok(response.value);
  }
}
