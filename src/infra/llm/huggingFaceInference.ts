import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import type { AppBoundaryError, AppBoundarySource } from "../../core/entities/appError";
import type {
  RawSentimentCandidate,
  SentimentModelPort,
  SummarizationPort,
  SummarizeOptions,
} from "../../core/ports/outboundPorts";
import { HttpClient, type HttpClientError } from "../http/httpClient";
import { toBoundaryError } from "../http/boundaryErrors";

const summaryResponseSchema = z
  .array(z.object({ summary_text: z.string() }))
  .min(1);

const candidateSchema = z.object({ label: z.string(), score: z.number() });

// Text-classification returns `[[...candidates]]` for one input; some models drop the outer array.
const classificationResponseSchema = z.union([
  z
    .array(z.array(candidateSchema))
    .min(1)
    .transform((batches) => batches[0] ?? []),
  z.array(candidateSchema),
]);

export type HuggingFaceModels = {
  summarization: string;
  sentiment: string;
};

/**
 * Hosted inference API serving both the summarization and the sentiment model.
 */
export class HuggingFaceInference implements SummarizationPort, SentimentModelPort {
  readonly provider = "huggingface";

  constructor(
    private readonly baseUrl: string,
    private readonly apiToken: string,
    private readonly models: HuggingFaceModels,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.apiToken.trim()) {
      throw new Error("HF_API_TOKEN is required for the Hugging Face backend.");
    }
  }

  async summarize(
    text: string,
    options: SummarizeOptions,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.post(
      this.models.summarization,
      {
        inputs: text,
        parameters: {
          max_length: options.maxLength,
          min_length: options.minLength,
          do_sample: false,
        },
      },
      options.signal,
    );
    if (response.isErr()) {
      return err(this.boundaryError("summarizer", response.error));
    }

    const parsed = summaryResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(this.malformed("summarizer", "summary_text", parsed.error));
    }

    return ok(parsed.data.map((entry) => entry.summary_text).join(" ").trim());
  }

  async classify(
    text: string,
    signal?: AbortSignal,
  ): Promise<Result<RawSentimentCandidate[], AppBoundaryError>> {
    const response = await this.post(this.models.sentiment, { inputs: text }, signal);
    if (response.isErr()) {
      return err(this.boundaryError("sentiment", response.error));
    }

    const parsed = classificationResponseSchema.safeParse(response.value);
    if (!parsed.success) {
      return err(this.malformed("sentiment", "label/score candidates", parsed.error));
    }

    return ok(parsed.data);
  }

  private post(
    model: string,
    payload: Record<string, unknown>,
    signal: AbortSignal | undefined,
  ): Promise<Result<unknown, HttpClientError>> {
    return this.httpClient.requestJson({
      url: `${this.baseUrl}/models/${model}`,
      method: "POST",
      headers: {
        authorization: `Bearer ${this.apiToken}`,
        "content-type": "application/json",
      },
      body: { ...payload, options: { wait_for_model: true } },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
      signal,
    });
  }

  private boundaryError(source: AppBoundarySource, error: HttpClientError): AppBoundaryError {
    return toBoundaryError(source, `${this.provider}:${source}`, error);
  }

  private malformed(
    source: AppBoundarySource,
    expected: string,
    cause: unknown,
  ): AppBoundaryError {
    return {
      source,
      code: "malformed_response",
      provider: `${this.provider}:${source}`,
      message: `Inference response did not contain ${expected}.`,
      retryable: false,
      cause,
    };
  }
}
