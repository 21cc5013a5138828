import type {
  SummarizationPort,
  SummarizeOptions,
} from "../../core/ports/outboundPorts";
import type { AppBoundaryError } from "../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpClient } from "../http/httpClient";
import { toBoundaryError } from "../http/boundaryErrors";

const ollamaChatResponseSchema = z.object({
  message: z.object({ content: z.string() }),
});

const buildPrompt = (text: string, maxWords: number): string =>
  [
    `Summarize the following news article in at most ${maxWords} words.`,
    "Keep the facts, figures and company names. Reply with the summary only.",
    "",
    text,
  ].join("\n");

/**
 * Local chat model used as a summarization backend.
 */
export class OllamaSummarizer implements SummarizationPort {
  readonly provider = "ollama";

  constructor(
    private readonly baseUrl: string,
    private readonly model: string,
    private readonly timeoutMs = 30_000,
    private readonly httpClient = new HttpClient(),
  ) {}

  async summarize(
    text: string,
    options: SummarizeOptions,
  ): Promise<Result<string, AppBoundaryError>> {
    const response = await this.httpClient.requestJson({
      url: `${this.baseUrl}/api/chat`,
      method: "POST",
      headers: { "content-type": "application/json" },
      body: {
        model: this.model,
        stream: false,
        options: { temperature: 0 },
        messages: [{ role: "user", content: buildPrompt(text, options.maxLength) }],
      },
      timeoutMs: this.timeoutMs,
      retries: 0,
      retryDelayMs: 0,
      signal: options.signal,
    });

    if (response.isErr()) {
      return err(toBoundaryError("summarizer", this.provider, response.error));
    }

    const parsed = ollamaChatResponseSchema.safeParse(response.value);
    const content = parsed.success ? parsed.data.message.content.trim() : "";
    if (!content) {
      return err({
        source: "summarizer",
        code: "malformed_response",
        provider: this.provider,
        message: "Ollama chat payload did not contain message.content.",
        retryable: false,
      });
    }

    return ok(content);
  }
}
