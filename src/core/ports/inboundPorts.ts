import type { Result } from "neverthrow";
import type { AppBoundaryError } from "../entities/appError";

export type NewsSearchRequest = {
  companyName: string;
  limit: number;
  signal?: AbortSignal;
};

/**
 * Provider-neutral news item; the article source turns these into pipeline articles.
 */
export type NormalizedNewsItem = {
  provider: string;
  providerItemId: string;
  title: string;
  content: string;
  url: string;
  sourceName: string;
  publishedAt: Date | null;
  sourceType: "api" | "rss" | "mock";
};

export interface NewsProviderPort {
  readonly name: string;
  fetchArticles(
    request: NewsSearchRequest,
  ): Promise<Result<NormalizedNewsItem[], AppBoundaryError>>;
}

/**
 * Deterministic stand-in articles used when live sources come up short.
 */
export interface SyntheticNewsPort {
  readonly name: string;
  synthesize(companyName: string, count: number): NormalizedNewsItem[];
}
