export const SENTIMENT_LABELS = ["Positive", "Negative", "Neutral"] as const;

export type SentimentLabel = (typeof SENTIMENT_LABELS)[number];

export type ArticleOrigin = "live" | "synthetic";

/**
 * Raw article as produced by the article source. `rawText` is never empty.
 */
export type SourcedArticle = {
  readonly id: string;
  readonly title: string;
  readonly url: string;
  readonly sourceName: string;
  readonly provider: string;
  readonly publishedAt: string | null;
  readonly rawText: string;
  readonly origin: ArticleOrigin;
};

export type SummaryMethod = "model" | "extractive" | "verbatim";

export type SummarizedArticle = SourcedArticle & {
  readonly summary: string;
  readonly topics: readonly string[];
  readonly summaryMethod: SummaryMethod;
};

export type SentimentMethod = "model" | "keyword-override" | "keyword-only";

export type Article = SummarizedArticle & {
  readonly sentiment: SentimentLabel;
  readonly sentimentConfidence: number;
  readonly sentimentMethod: SentimentMethod;
};
