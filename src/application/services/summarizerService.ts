import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type { StageIssue } from "../../core/entities/analysis";
import type {
  SourcedArticle,
  SummarizedArticle,
  SummaryMethod,
} from "../../core/entities/article";
import type { SummarizationPort } from "../../core/ports/outboundPorts";
import { mapWithConcurrency } from "../../shared/async/mapWithConcurrency";
import { callBoundary, withFallback } from "../../shared/resilience/boundaryCall";
import { chunkText, clipToLength, sanitize } from "../../shared/text/textUtils";
import { logger } from "../../shared/logger/logger";
import { extractiveSummary, extractTopics } from "../nlp/frequency";

export type SummarizerOptions = {
  maxChars: number;
  sentenceCount: number;
  topicCount: number;
  modelChunkChars: number;
  concurrency: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type SummaryOutcome = {
  summary: string;
  topics: string[];
  method: SummaryMethod;
  issue?: StageIssue;
};

const lengthBounds = (chunk: string): { maxLength: number; minLength: number } => {
  const words = chunk.split(" ").length;
  const maxLength = Math.min(150, Math.max(40, Math.floor(words / 2)));
  return { maxLength, minLength: Math.min(30, Math.floor(maxLength / 2)) };
};

export class SummarizerService {
  constructor(
    private readonly model: SummarizationPort | null,
    private readonly options: SummarizerOptions,
  ) {}

  private get providerName(): string {
    return this.model?.provider ?? "none";
  }

  async summarize(
    text: string,
    request: { excludeTerms?: readonly string[]; signal?: AbortSignal } = {},
  ): Promise<SummaryOutcome> {
    const clean = sanitize(text);
    const topics = extractTopics(
      clean,
      this.options.topicCount,
      request.excludeTerms ?? [],
    );

    if (clean.length <= this.options.maxChars) {
      return { summary: clean, topics, method: "verbatim" };
    }

    const { value, failure } = await withFallback(
      this.summarizeWithModel(clean, request.signal),
      () =>
        extractiveSummary(clean, this.options.sentenceCount, this.options.maxChars),
    );

    if (!failure) {
      return { summary: value, topics, method: "model" };
    }

    return {
      summary: value,
      topics,
      method: "extractive",
      issue: {
        stage: "summarize",
        code: "model_unavailable",
        reason: `${failure.code}: ${failure.message}`,
        provider: failure.provider,
      },
    };
  }

  /**
   * Summarizes each article in a bounded pool. Model fallbacks are folded into one issue.
   */
  async summarizeArticles(
    articles: readonly SourcedArticle[],
    companyName: string,
    signal?: AbortSignal,
  ): Promise<{ articles: SummarizedArticle[]; issues: StageIssue[] }> {
    const outcomes = await mapWithConcurrency(
      articles,
      this.options.concurrency,
      (article) =>
        this.summarize(article.rawText, { excludeTerms: [companyName], signal }),
    );

    const summarized = articles.map((article, index): SummarizedArticle => {
      const outcome = outcomes[index];
      if (!outcome) {
        throw new Error(`Missing summary for article ${article.id}.`);
      }

      return {
        ...article,
        summary: outcome.summary,
        topics: outcome.topics,
        summaryMethod: outcome.method,
      };
    });

    const fallbacks = outcomes.filter((outcome) => outcome.issue !== undefined);
    const firstIssue = fallbacks[0]?.issue;
    if (!firstIssue) {
      return { articles: summarized, issues: [] };
    }

    logger.warn(
      { provider: this.providerName, fallbacks: fallbacks.length, companyName },
      "Summarization fell back to extractive summaries",
    );

    return {
      articles: summarized,
      issues: [
        {
          ...firstIssue,
          reason: `Extractive summary used for ${fallbacks.length} of ${articles.length} article(s); ${firstIssue.reason}`,
        },
      ],
    };
  }

  private async summarizeWithModel(
    text: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<string, AppBoundaryError>> {
    const model = this.model;
    if (!model) {
      return err({
        source: "summarizer",
        code: "config_invalid",
        provider: "none",
        message: "No summarization backend is configured.",
        retryable: false,
      });
    }

    const pieces: string[] = [];
    for (const chunk of chunkText(text, this.options.modelChunkChars)) {
      const result = await callBoundary(
        {
          source: "summarizer",
          provider: model.provider,
          timeoutMs: this.options.timeoutMs,
          retries: this.options.retries,
          retryDelayMs: this.options.retryDelayMs,
        },
        (callSignal) =>
          model.summarize(chunk, { ...lengthBounds(chunk), signal: callSignal }),
        signal,
      );
      if (result.isErr()) {
        return err(result.error);
      }
      pieces.push(result.value);
    }

    const summary = clipToLength(pieces.join(" "), this.options.maxChars);
    if (!summary) {
      return err({
        source: "summarizer",
        code: "malformed_response",
        provider: model.provider,
        message: "Summarization model returned empty output.",
        retryable: false,
      });
    }

    return ok(summary);
  }
}
