import { describe, expect, it } from "vitest";
import { err, ok } from "neverthrow";
import { ArticleSourceService, type ArticleSourceOptions } from "./articleSourceService";
import { MockNewsProvider } from "../../infra/providers/mocks/mockNewsProvider";
import type {
  NewsProviderPort,
  NormalizedNewsItem,
} from "../../core/ports/inboundPorts";

const fixedClock = { now: () => new Date("2026-03-01T12:00:00.000Z") };

const options: ArticleSourceOptions = {
  maxArticles: 10,
  minLiveArticles: 1,
  concurrency: 2,
  timeoutMs: 200,
  retries: 0,
  retryDelayMs: 0,
};

const liveItem = (
  overrides: Partial<NormalizedNewsItem> & { providerItemId: string },
): NormalizedNewsItem => ({
  provider: "test-wire",
  title: `Headline ${overrides.providerItemId}`,
  content: `Body for ${overrides.providerItemId}.`,
  url: `https://news.test/${overrides.providerItemId}`,
  sourceName: "Test Wire",
  publishedAt: new Date("2026-02-27T00:00:00.000Z"),
  sourceType: "rss",
  ...overrides,
});

const failingProvider = (name: string): NewsProviderPort => ({
  name,
  fetchArticles: async () =>
    err({
      source: "news",
      code: "transport_error",
      provider: name,
      message: "connection refused",
      retryable: false,
    }),
});

const staticProvider = (
  name: string,
  items: NormalizedNewsItem[],
): NewsProviderPort => ({
  name,
  fetchArticles: async () => ok(items),
});

describe("ArticleSourceService", () => {
  it("fills the whole set with synthetic articles when every provider fails", async () => {
    const service = new ArticleSourceService(
      [failingProvider("wire-a"), failingProvider("wire-b")],
      new MockNewsProvider(fixedClock),
      options,
    );

    const outcome = await service.fetchArticles("Tesla");

    expect(outcome.articles).toHaveLength(10);
    expect(outcome.articles.every((article) => article.origin === "synthetic")).toBe(true);
    expect(outcome.articles.every((article) => article.rawText.length > 0)).toBe(true);
    expect(outcome.issues.map((issue) => issue.code)).toEqual([
      "source_unavailable",
      "source_unavailable",
      "insufficient_articles",
    ]);
    expect(outcome.issues[0]?.reason).toBe(
      "wire-a failed (transport_error): connection refused",
    );
  });

  it("keeps live articles and skips synthesis when the minimum is met", async () => {
    const service = new ArticleSourceService(
      [
        failingProvider("wire-a"),
        staticProvider("wire-b", [liveItem({ providerItemId: "one" })]),
      ],
      new MockNewsProvider(fixedClock),
      options,
    );

    const outcome = await service.fetchArticles("Tesla");

    expect(outcome.articles).toEqual([
      {
        id: "test-wire:one",
        title: "Headline one",
        url: "https://news.test/one",
        sourceName: "Test Wire",
        provider: "test-wire",
        publishedAt: "2026-02-27T00:00:00.000Z",
        rawText: "Body for one.",
        origin: "live",
      },
    ]);
    expect(outcome.issues).toHaveLength(1);
    expect(outcome.issues[0]?.provider).toBe("wire-a");
  });

  it("dedupes by url keeping the newest copy and orders newest first", async () => {
    const older = liveItem({
      providerItemId: "dup-old",
      url: "https://news.test/shared",
      publishedAt: new Date("2026-02-20T00:00:00.000Z"),
    });
    const newer = liveItem({
      providerItemId: "dup-new",
      url: "https://NEWS.test/shared ",
      publishedAt: new Date("2026-02-25T00:00:00.000Z"),
    });
    const undated = liveItem({ providerItemId: "undated", publishedAt: null });
    const latest = liveItem({
      providerItemId: "latest",
      publishedAt: new Date("2026-02-28T00:00:00.000Z"),
    });

    const service = new ArticleSourceService(
      [
        staticProvider("wire-a", [older, undated]),
        staticProvider("wire-b", [newer, latest]),
      ],
      new MockNewsProvider(fixedClock),
      options,
    );

    const outcome = await service.fetchArticles("Tesla");

    expect(outcome.articles.map((article) => article.id)).toEqual([
      "test-wire:latest",
      "test-wire:dup-new",
      "test-wire:undated",
    ]);
    expect(outcome.issues).toEqual([]);
  });

  it("reports a provider whose items have no usable text", async () => {
    const service = new ArticleSourceService(
      [staticProvider("wire-a", [liveItem({ providerItemId: "blank", content: "   " })])],
      new MockNewsProvider(fixedClock),
      { ...options, maxArticles: 3 },
    );

    const outcome = await service.fetchArticles("Tesla");

    expect(outcome.articles).toHaveLength(3);
    expect(outcome.issues.map((issue) => issue.reason)).toEqual([
      "wire-a returned no usable articles.",
      "Only 0 live article(s) found; minimum is 1.",
    ]);
  });

  it("treats a hanging provider as unavailable after the timeout", async () => {
    const hanging: NewsProviderPort = {
      name: "wire-slow",
      fetchArticles: () => new Promise(() => undefined),
    };
    const service = new ArticleSourceService(
      [hanging, staticProvider("wire-b", [liveItem({ providerItemId: "fast" })])],
      new MockNewsProvider(fixedClock),
      { ...options, timeoutMs: 20 },
    );

    const outcome = await service.fetchArticles("Tesla");

    expect(outcome.articles.map((article) => article.id)).toEqual(["test-wire:fast"]);
    expect(outcome.issues[0]?.code).toBe("source_unavailable");
    expect(outcome.issues[0]?.provider).toBe("wire-slow");
  });

  it("honors an explicit limit", async () => {
    const service = new ArticleSourceService([], new MockNewsProvider(fixedClock), options);

    const outcome = await service.fetchArticles("Tesla", { limit: 4 });

    expect(outcome.articles).toHaveLength(4);
    expect(new Set(outcome.articles.map((article) => article.id)).size).toBe(4);
  });
});
