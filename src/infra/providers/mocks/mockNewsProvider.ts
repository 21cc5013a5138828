import type {
  NewsProviderPort,
  NewsSearchRequest,
  NormalizedNewsItem,
  SyntheticNewsPort,
} from "../../../core/ports/inboundPorts";
import type { AppBoundaryError } from "../../../core/entities/appError";
import type { ClockPort } from "../../../core/ports/outboundPorts";
import { ok, type Result } from "neverthrow";
import { sanitize, slugify, stableHash } from "../../../shared/text/textUtils";
import defaultTemplates from "./mockArticleTemplates.json";

export type MockArticleTemplate = {
  key: string;
  sourceName: string;
  title: string;
  body: string;
};

const HOUR_MS = 60 * 60 * 1000;

const fill = (template: string, companyName: string): string =>
  template.replaceAll("{company}", companyName);

/**
 * Supplies repeatable company-scoped articles so the pipeline always has input when live sources fail.
 * Output depends only on the company name, the requested count and the clock.
 */
export class MockNewsProvider
  implements NewsProviderPort, SyntheticNewsPort
{
  readonly name = "mock-news-wire";

  constructor(
    private readonly clock: ClockPort,
    private readonly templates: readonly MockArticleTemplate[] = defaultTemplates,
  ) {
    if (templates.length === 0) {
      throw new Error("MockNewsProvider requires at least one template.");
    }
  }

  async fetchArticles(
    request: NewsSearchRequest,
  ): Promise<Result<NormalizedNewsItem[], AppBoundaryError>> {
    return ok(this.synthesize(request.companyName, request.limit));
  }

  /**
   * Rotates through templates from an offset derived from the company name.
   */
  synthesize(companyName: string, count: number): NormalizedNewsItem[] {
    const name = sanitize(companyName);
    const slug = slugify(name) || "company";
    const offset = stableHash(name.toLowerCase()) % this.templates.length;
    const baseTime = this.clock.now().getTime();

    return Array.from({ length: Math.max(0, count) }, (_, index) => {
      const template = this.pickTemplate(offset + index);

      return {
        provider: this.name,
        providerItemId: `${slug}-${index + 1}-${template.key}`,
        title: fill(template.title, name),
        content: fill(template.body, name),
        url: `https://example.local/news/${slug}/${index + 1}-${template.key}`,
        sourceName: template.sourceName,
        publishedAt: new Date(baseTime - index * 12 * HOUR_MS),
        sourceType: "mock",
      };
    });
  }

  private pickTemplate(position: number): MockArticleTemplate {
    const template = this.templates[position % this.templates.length];
    if (!template) {
      throw new Error(`No mock template at position ${position}.`);
    }

    return template;
  }
}
