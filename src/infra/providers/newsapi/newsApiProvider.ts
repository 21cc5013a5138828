import type {
  NewsProviderPort,
  NewsSearchRequest,
  NormalizedNewsItem,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import { err, ok, type Result } from "neverthrow";
import { z } from "zod";
import { HttpClient } from "../../http/httpClient";
import { toBoundaryError } from "../../http/boundaryErrors";
import { sanitize } from "../../../shared/text/textUtils";
import { parsePublishedAt } from "../utils/dateUtils";

const newsApiArticleSchema = z.object({
  source: z.object({ name: z.string().nullish() }).nullish(),
  title: z.string().nullish(),
  description: z.string().nullish(),
  url: z.string().nullish(),
  publishedAt: z.string().nullish(),
  content: z.string().nullish(),
});

const newsApiResponseSchema = z.object({
  status: z.string(),
  message: z.string().optional(),
  articles: z.array(z.unknown()).optional(),
});

type NewsApiArticle = z.infer<typeof newsApiArticleSchema>;

// NewsAPI truncates `content` and appends a marker such as "… [+2140 chars]".
const TRUNCATION_MARKER = /\s*(…|\.\.\.)?\s*\[\+\d+ chars\]$/;

/**
 * Translates NewsAPI `everything` search payloads into the app's normalized news contract.
 */
export class NewsApiProvider implements NewsProviderPort {
  readonly name = "newsapi";

  constructor(
    private readonly baseUrl: string,
    private readonly apiKey: string,
    private readonly timeoutMs = 10_000,
    private readonly httpClient = new HttpClient(),
  ) {
    if (!this.apiKey.trim()) {
      throw new Error(
        "NEWS_API_KEY is required when NEWS_PROVIDERS includes newsapi.",
      );
    }
  }

  async fetchArticles(
    request: NewsSearchRequest,
  ): Promise<Result<NormalizedNewsItem[], AppBoundaryError>> {
    const url = new URL("/v2/everything", this.baseUrl);
    url.searchParams.set("q", `"${request.companyName}"`);
    url.searchParams.set("language", "en");
    url.searchParams.set("sortBy", "publishedAt");
    url.searchParams.set("pageSize", String(request.limit));

    const payloadResult = await this.httpClient.requestJson({
      url: url.toString(),
      method: "GET",
      headers: { "X-Api-Key": this.apiKey },
      timeoutMs: this.timeoutMs,
      retries: 1,
      retryDelayMs: 250,
      signal: request.signal,
    });

    if (payloadResult.isErr()) {
      return err(toBoundaryError("news", this.name, payloadResult.error));
    }

    const payload = newsApiResponseSchema.safeParse(payloadResult.value);
    if (!payload.success || payload.data.status !== "ok" || !payload.data.articles) {
      return err({
        source: "news",
        code: "malformed_response",
        provider: this.name,
        message:
          (payload.success ? payload.data.message : undefined) ??
          "NewsAPI response did not contain an articles array.",
        retryable: false,
        cause: payload.success ? payload.data.status : payload.error,
      });
    }

    return ok(
      payload.data.articles
        .slice(0, request.limit)
        .map((item, index) => this.toNormalizedItem(item, index))
        .filter((item): item is NormalizedNewsItem => item !== null),
    );
  }

  private toNormalizedItem(
    raw: unknown,
    index: number,
  ): NormalizedNewsItem | null {
    const parsed = newsApiArticleSchema.safeParse(raw);
    if (!parsed.success) {
      return null;
    }

    const item: NewsApiArticle = parsed.data;
    const title = sanitize(item.title);
    if (!title || title === "[Removed]") {
      return null;
    }

    const description = sanitize(item.description);
    const body = sanitize(item.content).replace(TRUNCATION_MARKER, "");
    const content = [description, body]
      .filter((part, position, parts) => part && parts.indexOf(part) === position)
      .join(" ");

    return {
      provider: this.name,
      providerItemId: item.url ?? `newsapi-${index}`,
      title,
      content: content || title,
      url: item.url ?? "",
      sourceName: sanitize(item.source?.name) || "NewsAPI",
      publishedAt: parsePublishedAt(item.publishedAt),
      sourceType: "api",
    };
  }
}
