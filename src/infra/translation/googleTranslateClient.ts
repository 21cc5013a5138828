import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { TranslationPort } from "../../core/ports/outboundPorts";
import { HttpClient } from "../http/httpClient";
import { toBoundaryError } from "../http/boundaryErrors";
import { chunkText, sanitize } from "../../shared/text/textUtils";

// [[["translated", "original", ...], ...], null, "en", ...]
const translateResponseSchema = z
  .tuple([z.array(z.tuple([z.string().nullable()]).rest(z.unknown()))])
  .rest(z.unknown());

const MAX_QUERY_CHARS = 1_800;

/**
 * Google Translate web endpoint; long text is sent in sentence-aligned pieces.
 */
export class GoogleTranslateClient implements TranslationPort {
  readonly provider = "google-translate";

  constructor(
    private readonly baseUrl: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  async translate(
    text: string,
    targetLanguage: string,
    signal?: AbortSignal,
  ): Promise<Result<string, AppBoundaryError>> {
    const pieces: string[] = [];
    for (const chunk of chunkText(text, MAX_QUERY_CHARS)) {
      const translated = await this.translateChunk(chunk, targetLanguage, signal);
      if (translated.isErr()) {
        return err(translated.error);
      }
      pieces.push(translated.value);
    }

    const joined = sanitize(pieces.join(" "));
    if (!joined) {
      return err(this.malformed("Translation response contained no text."));
    }

    return ok(joined);
  }

  private async translateChunk(
    chunk: string,
    targetLanguage: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<string, AppBoundaryError>> {
    const url = new URL("/translate_a/single", this.baseUrl);
    url.searchParams.set("client", "gtx");
    url.searchParams.set("sl", "auto");
    url.searchParams.set("tl", targetLanguage);
    url.searchParams.set("dt", "t");
    url.searchParams.set("q", chunk);

    const response = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
      signal,
    });
    if (response.isErr()) {
      return err(toBoundaryError("translation", this.provider, response.error));
    }

    const parsed = translateResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(this.malformed("Unexpected translation response shape.", parsed.error));
    }

    return ok(parsed.data[0].map((segment) => segment[0] ?? "").join(""));
  }

  private malformed(message: string, cause?: unknown): AppBoundaryError {
    return {
      source: "translation",
      code: "malformed_response",
      provider: this.provider,
      message,
      retryable: false,
      cause,
    };
  }
}
