import type { SourcedArticle } from "../../core/entities/article";
import type { StageIssue } from "../../core/entities/analysis";
import type {
  NewsProviderPort,
  NormalizedNewsItem,
  SyntheticNewsPort,
} from "../../core/ports/inboundPorts";
import { mapWithConcurrency } from "../../shared/async/mapWithConcurrency";
import { callBoundary } from "../../shared/resilience/boundaryCall";
import { sanitize } from "../../shared/text/textUtils";
import { logger } from "../../shared/logger/logger";

export type ArticleSourceOptions = {
  maxArticles: number;
  minLiveArticles: number;
  concurrency: number;
  timeoutMs: number;
  retries: number;
  retryDelayMs: number;
};

export type ArticleSourceOutcome = {
  articles: SourcedArticle[];
  issues: StageIssue[];
};

type ProviderOutcome = {
  items: NormalizedNewsItem[];
  issue?: StageIssue;
};

const normalizeUrl = (value: string): string => value.trim().toLowerCase();

const newestFirst = (
  left: NormalizedNewsItem,
  right: NormalizedNewsItem,
): number => {
  if (left.publishedAt && right.publishedAt) {
    return right.publishedAt.getTime() - left.publishedAt.getTime();
  }

  if (left.publishedAt) {
    return -1;
  }

  return right.publishedAt ? 1 : 0;
};

/**
 * Gathers article candidates from every configured provider and tops the set up with
 * synthetic articles when too few live ones arrive.
 */
export class ArticleSourceService {
  constructor(
    private readonly providers: readonly NewsProviderPort[],
    private readonly synthetic: SyntheticNewsPort,
    private readonly options: ArticleSourceOptions,
  ) {}

  async fetchArticles(
    companyName: string,
    request: { limit?: number; signal?: AbortSignal } = {},
  ): Promise<ArticleSourceOutcome> {
    const limit = request.limit ?? this.options.maxArticles;

    const outcomes = await mapWithConcurrency(
      this.providers,
      this.options.concurrency,
      (provider) => this.fetchFromProvider(provider, companyName, limit, request.signal),
    );

    const issues = outcomes
      .map((outcome) => outcome.issue)
      .filter((issue): issue is StageIssue => issue !== undefined);
    const merged = this.mergeItems(
      outcomes.flatMap((outcome) => outcome.items),
      limit,
    );

    const liveCount = merged.filter((item) => item.sourceType !== "mock").length;
    if (liveCount >= this.options.minLiveArticles) {
      return { articles: merged.map((item) => this.toArticle(item)), issues };
    }

    const shortfall = Math.max(0, limit - merged.length);
    const synthesized = this.synthetic.synthesize(companyName, shortfall);

    logger.warn(
      {
        companyName,
        liveCount,
        minLiveArticles: this.options.minLiveArticles,
        synthesized: synthesized.length,
      },
      "Too few live articles; filling with synthetic articles",
    );

    return {
      articles: [...merged, ...synthesized].map((item) => this.toArticle(item)),
      issues: [
        ...issues,
        {
          stage: "fetch",
          code: "insufficient_articles",
          reason: `Only ${liveCount} live article(s) found; minimum is ${this.options.minLiveArticles}.`,
          provider: this.synthetic.name,
        },
      ],
    };
  }

  private async fetchFromProvider(
    provider: NewsProviderPort,
    companyName: string,
    limit: number,
    signal: AbortSignal | undefined,
  ): Promise<ProviderOutcome> {
    const result = await callBoundary(
      {
        source: "news",
        provider: provider.name,
        timeoutMs: this.options.timeoutMs,
        retries: this.options.retries,
        retryDelayMs: this.options.retryDelayMs,
      },
      (callSignal) =>
        provider.fetchArticles({ companyName, limit, signal: callSignal }),
      signal,
    );

    if (result.isErr()) {
      return {
        items: [],
        issue: {
          stage: "fetch",
          code: "source_unavailable",
          reason: `${provider.name} failed (${result.error.code}): ${result.error.message}`,
          provider: provider.name,
        },
      };
    }

    const items = result.value.filter((item) => sanitize(item.content).length > 0);
    if (items.length === 0) {
      logger.warn(
        { provider: provider.name, companyName },
        "News provider returned no usable articles; continuing with available sources",
      );

      return {
        items,
        issue: {
          stage: "fetch",
          code: "source_unavailable",
          reason: `${provider.name} returned no usable articles.`,
          provider: provider.name,
        },
      };
    }

    return { items };
  }

  /**
   * Dedupes by URL keeping the newest copy, then orders newest first with undated items last.
   */
  private mergeItems(
    items: NormalizedNewsItem[],
    limit: number,
  ): NormalizedNewsItem[] {
    const dedupedByUrl = new Map<string, NormalizedNewsItem>();
    const withoutUrl: NormalizedNewsItem[] = [];

    items.forEach((item) => {
      const key = normalizeUrl(item.url);
      if (key.length === 0) {
        withoutUrl.push(item);
        return;
      }

      const existing = dedupedByUrl.get(key);
      if (!existing || newestFirst(item, existing) < 0) {
        dedupedByUrl.set(key, item);
      }
    });

    return [...dedupedByUrl.values(), ...withoutUrl]
      .sort(newestFirst)
      .slice(0, limit);
  }

  private toArticle(item: NormalizedNewsItem): SourcedArticle {
    return {
      id: `${item.provider}:${item.providerItemId}`,
      title: item.title,
      url: item.url,
      sourceName: item.sourceName,
      provider: item.provider,
      publishedAt: item.publishedAt ? item.publishedAt.toISOString() : null,
      rawText: sanitize(item.content),
      origin: item.sourceType === "mock" ? "synthetic" : "live",
    };
  }
}
