import { err, ok, type Result } from "neverthrow";
import type { AppBoundaryError } from "../../core/entities/appError";
import type {
  SentimentDistribution,
  StageIssue,
} from "../../core/entities/analysis";
import type {
  Article,
  SentimentLabel,
  SentimentMethod,
  SummarizedArticle,
} from "../../core/entities/article";
import type { SentimentModelPort } from "../../core/ports/outboundPorts";
import { mapWithConcurrency } from "../../shared/async/mapWithConcurrency";
import { callBoundary } from "../../shared/resilience/boundaryCall";
import { chunkText, sanitize } from "../../shared/text/textUtils";
import { logger } from "../../shared/logger/logger";
import {
  averageDistributions,
  combineSentiment,
  DEFAULT_LEXICON,
  DEFAULT_OVERRIDE_POLICY,
  scanKeywords,
  scoreFromDistribution,
  toDistribution,
  type KeywordLexicon,
  type OverridePolicy,
} from "../nlp/sentimentRules";

export type SentimentOptions = {
  chunkChars: number;
  concurrency: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
  overridePolicy?: OverridePolicy;
  lexicon?: KeywordLexicon;
};

export type SentimentOutcome = {
  label: SentimentLabel;
  confidence: number;
  method: SentimentMethod;
  issue?: StageIssue;
};

export class SentimentService {
  constructor(
    private readonly model: SentimentModelPort | null,
    private readonly options: SentimentOptions,
  ) {}

  async classify(text: string, signal?: AbortSignal): Promise<SentimentOutcome> {
    const clean = sanitize(text);
    const keywords = scanKeywords(clean, this.options.lexicon ?? DEFAULT_LEXICON);
    const policy = this.options.overridePolicy ?? DEFAULT_OVERRIDE_POLICY;

    const statistical = await this.classifyWithModel(clean, signal);
    if (statistical.isOk()) {
      return combineSentiment(scoreFromDistribution(statistical.value), keywords, policy);
    }

    return {
      ...combineSentiment(null, keywords, policy),
      issue: {
        stage: "classify",
        code: "model_unavailable",
        reason: `${statistical.error.code}: ${statistical.error.message}`,
        provider: statistical.error.provider,
      },
    };
  }

  /**
   * Classifies each article's raw text in a bounded pool. Model fallbacks are folded into one issue.
   */
  async classifyArticles(
    articles: readonly SummarizedArticle[],
    signal?: AbortSignal,
  ): Promise<{ articles: Article[]; issues: StageIssue[] }> {
    const outcomes = await mapWithConcurrency(
      articles,
      this.options.concurrency,
      (article) => this.classify(article.rawText, signal),
    );

    const classified = articles.map((article, index): Article => {
      const outcome = outcomes[index];
      if (!outcome) {
        throw new Error(`Missing sentiment for article ${article.id}.`);
      }

      return {
        ...article,
        sentiment: outcome.label,
        sentimentConfidence: outcome.confidence,
        sentimentMethod: outcome.method,
      };
    });

    const fallbacks = outcomes.filter((outcome) => outcome.issue !== undefined);
    const firstIssue = fallbacks[0]?.issue;
    if (!firstIssue) {
      return { articles: classified, issues: [] };
    }

    logger.warn(
      { provider: firstIssue.provider, fallbacks: fallbacks.length },
      "Sentiment classification fell back to keyword scoring",
    );

    return {
      articles: classified,
      issues: [
        {
          ...firstIssue,
          reason: `Keyword-only sentiment used for ${fallbacks.length} of ${articles.length} article(s); ${firstIssue.reason}`,
        },
      ],
    };
  }

  /**
   * Averages per-chunk label distributions; any failed chunk fails the whole text.
   */
  private async classifyWithModel(
    text: string,
    signal: AbortSignal | undefined,
  ): Promise<Result<SentimentDistribution, AppBoundaryError>> {
    const model = this.model;
    if (!model) {
      return err({
        source: "sentiment",
        code: "config_invalid",
        provider: "none",
        message: "No sentiment backend is configured.",
        retryable: false,
      });
    }

    const distributions: SentimentDistribution[] = [];
    for (const chunk of chunkText(text, this.options.chunkChars)) {
      const result = await callBoundary(
        {
          source: "sentiment",
          provider: model.provider,
          timeoutMs: this.options.timeoutMs,
          retries: this.options.retries,
          retryDelayMs: this.options.retryDelayMs,
        },
        (callSignal) => model.classify(chunk, callSignal),
        signal,
      );
      if (result.isErr()) {
        return err(result.error);
      }

      const distribution = toDistribution(result.value);
      if (!distribution) {
        return err({
          source: "sentiment",
          code: "malformed_response",
          provider: model.provider,
          message: `Sentiment model returned no recognizable labels (${result.value
            .map((candidate) => candidate.label)
            .join(", ")}).`,
          retryable: false,
        });
      }
      distributions.push(distribution);
    }

    const average = averageDistributions(distributions);
    if (!average) {
      return err({
        source: "sentiment",
        code: "validation_error",
        provider: model.provider,
        message: "No text to classify.",
        retryable: false,
      });
    }

    return ok(average);
  }
}
