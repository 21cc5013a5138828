import { describe, expect, it } from "vitest";
import { appCompanies, newsProviders, newsSources, parseEnv } from "./env";

describe("env", () => {
  it("fills defaults for unset variables", () => {
    const config = parseEnv({});

    expect(config.HTTP_PORT).toBe(8000);
    expect(config.MAX_ARTICLES).toBe(10);
    expect(config.TTS_LANGUAGE).toBe("hi");
    expect(config.SUMMARY_MAX_CHARS).toBe(400);
  });

  it("coerces numeric variables and rejects invalid ones", () => {
    expect(parseEnv({ MAX_ARTICLES: "4" }).MAX_ARTICLES).toBe(4);
    expect(() => parseEnv({ MAX_ARTICLES: "zero" })).toThrow();
    expect(() => parseEnv({ SUMMARIZER_PROVIDER: "openai" })).toThrow();
  });

  it("caps speech chunks at the synthesis endpoint's 200 character limit", () => {
    expect(parseEnv({ TTS_MAX_CHUNK_CHARS: "200" }).TTS_MAX_CHUNK_CHARS).toBe(200);
    expect(() => parseEnv({ TTS_MAX_CHUNK_CHARS: "201" })).toThrow();
  });

  it("dedupes company names case-insensitively in configured order", () => {
    expect(appCompanies(parseEnv({ APP_COMPANIES: "Tesla, apple,TESLA,,Infosys" }))).toEqual([
      "Tesla",
      "apple",
      "Infosys",
    ]);
  });

  it("ignores unknown news providers and falls back to the mock wire", () => {
    expect(newsProviders(parseEnv({ NEWS_PROVIDERS: "newsapi,bogus,NewsAPI" }))).toEqual([
      "newsapi",
    ]);
    expect(newsProviders(parseEnv({ NEWS_PROVIDERS: "bogus" }))).toEqual(["mock"]);
  });

  it("splits source domains", () => {
    expect(newsSources(parseEnv({ NEWS_SOURCES: "Reuters.com, livemint.com" }))).toEqual([
      "reuters.com",
      "livemint.com",
    ]);
  });
});
