import { describe, expect, it } from "vitest";
import { MockNewsProvider } from "./mockNewsProvider";

const clock = { now: () => new Date("2026-03-01T12:00:00.000Z") };

describe("MockNewsProvider", () => {
  it("rotates templates from an offset derived from the company name", () => {
    const items = new MockNewsProvider(clock).synthesize("Apple", 3);

    expect(items.map((item) => item.url)).toEqual([
      "https://example.local/news/apple/1-record-profit",
      "https://example.local/news/apple/2-restructuring",
      "https://example.local/news/apple/3-market-share",
    ]);
  });

  it("fills the company name into titles and bodies", () => {
    const [first] = new MockNewsProvider(clock).synthesize("Tesla", 1);

    expect(first).toEqual({
      provider: "mock-news-wire",
      providerItemId: "tesla-1-earnings",
      title: "Tesla reports quarterly earnings above expectations",
      content: expect.stringContaining("Tesla has reported earnings above Wall Street expectations"),
      url: "https://example.local/news/tesla/1-earnings",
      sourceName: "Reuters",
      publishedAt: new Date("2026-03-01T12:00:00.000Z"),
      sourceType: "mock",
    });
  });

  it("spaces publication times twelve hours apart", () => {
    const items = new MockNewsProvider(clock).synthesize("Tesla", 2);

    expect(items[1]?.publishedAt?.toISOString()).toBe("2026-03-01T00:00:00.000Z");
  });

  it("is deterministic for the same name and clock", () => {
    const provider = new MockNewsProvider(clock);

    expect(provider.synthesize("Infosys", 12)).toEqual(provider.synthesize("Infosys", 12));
    expect(provider.synthesize("Infosys", 12)).toHaveLength(12);
  });

  it("serves the same items through the provider port", async () => {
    const provider = new MockNewsProvider(clock);
    const result = await provider.fetchArticles({ companyName: "Tesla", limit: 2 });

    expect(result._unsafeUnwrap()).toEqual(provider.synthesize("Tesla", 2));
  });

  it("rejects an empty template list", () => {
    expect(() => new MockNewsProvider(clock, [])).toThrow(
      "MockNewsProvider requires at least one template.",
    );
  });
});
