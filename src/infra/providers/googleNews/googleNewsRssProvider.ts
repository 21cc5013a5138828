import Parser from "rss-parser";
import { err, ok, ResultAsync, type Result } from "neverthrow";
import type {
  NewsProviderPort,
  NewsSearchRequest,
  NormalizedNewsItem,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import { HttpClient } from "../../http/httpClient";
import { toBoundaryError } from "../../http/boundaryErrors";
import { sanitize } from "../../../shared/text/textUtils";
import { parsePublishedAt } from "../utils/dateUtils";

type GoogleNewsItemExtras = {
  source?: unknown;
};

const BROWSER_HEADERS = {
  "User-Agent":
    "Mozilla/5.0 (X11; Linux x86_64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0 Safari/537.36",
  Accept: "application/rss+xml, application/xml;q=0.9, */*;q=0.8",
  "Accept-Language": "en-US,en;q=0.5",
};

const escapeRegExp = (value: string): string =>
  value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");

const readSourceName = (value: unknown): string | undefined => {
  if (typeof value === "string") {
    return sanitize(value) || undefined;
  }

  if (value && typeof value === "object" && "_" in value) {
    const text = value._;
    return typeof text === "string" ? sanitize(text) || undefined : undefined;
  }

  return undefined;
};

/**
 * Searches Google News RSS for a company restricted to one publisher domain.
 * One instance per configured domain keeps each source independently fallible.
 */
export class GoogleNewsRssProvider implements NewsProviderPort {
  readonly name: string;

  constructor(
    private readonly baseUrl: string,
    private readonly sourceDomain: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpClient(),
    private readonly parser = new Parser<
      Record<string, unknown>,
      GoogleNewsItemExtras
    >({ customFields: { item: ["source"] } }),
  ) {
    this.name = `google-news:${sourceDomain}`;
  }

  async fetchArticles(
    request: NewsSearchRequest,
  ): Promise<Result<NormalizedNewsItem[], AppBoundaryError>> {
    const url = new URL("/rss/search", this.baseUrl);
    url.searchParams.set(
      "q",
      `"${request.companyName}" site:${this.sourceDomain}`,
    );
    url.searchParams.set("hl", "en-IN");
    url.searchParams.set("gl", "IN");
    url.searchParams.set("ceid", "IN:en");

    const feedResult = await this.httpClient.requestText({
      url: url.toString(),
      method: "GET",
      headers: BROWSER_HEADERS,
      timeoutMs: this.timeoutMs,
      retries: 1,
      retryDelayMs: 250,
      signal: request.signal,
    });

    if (feedResult.isErr()) {
      return err(toBoundaryError("news", this.name, feedResult.error));
    }

    const feed = await ResultAsync.fromPromise(
      this.parser.parseString(feedResult.value),
      (parseError): AppBoundaryError => ({
        source: "news",
        code: "malformed_response",
        provider: this.name,
        message: "Google News response was not a valid RSS document.",
        retryable: false,
        cause: parseError,
      }),
    );
    if (feed.isErr()) {
      return err(feed.error);
    }

    return ok(
      feed.value.items
        .slice(0, request.limit)
        .map((item, index) => this.toNormalizedItem(item, index))
        .filter((item): item is NormalizedNewsItem => item !== null),
    );
  }

  private toNormalizedItem(
    item: Parser.Item & GoogleNewsItemExtras,
    index: number,
  ): NormalizedNewsItem | null {
    const sourceName = readSourceName(item.source) ?? this.sourceDomain;
    // Google appends " - <publisher>" to every headline.
    const title = sanitize(item.title).replace(
      new RegExp(`\\s+-\\s+${escapeRegExp(sourceName)}$`),
      "",
    );
    if (!title) {
      return null;
    }

    const snippet = sanitize(item.contentSnippet);

    return {
      provider: this.name,
      providerItemId: item.guid ?? `${this.sourceDomain}-${index}`,
      title,
      content: snippet.length > title.length ? snippet : title,
      url: item.link ?? "",
      sourceName,
      publishedAt: parsePublishedAt(item.isoDate ?? item.pubDate),
      sourceType: "rss",
    };
  }
}
