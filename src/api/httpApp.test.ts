import { describe, expect, it } from "vitest";
import { err } from "neverthrow";
import { createHttpApp, type HttpAppDependencies } from "./httpApp";
import { validateCompanyName } from "../application/services/analysisOrchestratorService";
import type { AnalysisResult, AudioResult } from "../core/entities/analysis";

const audio: AudioResult = {
  audioRef: "memory://clip-1",
  contentType: "audio/mpeg",
  byteLength: 2,
  languageCode: "hi",
  sourceText: "summary",
  isFallback: false,
};

const analysisFor = (companyName: string): AnalysisResult => ({
  report: {
    companyName,
    articles: [],
    sentimentDistribution: { Positive: 0, Negative: 0, Neutral: 0 },
    topicOverlap: [],
    commonTopics: [],
    coverageDifferences: [],
    overallSignal: "Neutral",
    narrativeText: `No recent news coverage of ${companyName} was available.`,
  },
  audio,
  degraded: true,
  stageIssues: [],
  states: ["Fetching", "Summarizing", "Classifying", "Comparing", "Rendering", "Done"],
});

const makeApp = (overrides: Partial<HttpAppDependencies> = {}) =>
  createHttpApp({
    companies: ["Tesla", "Apple"],
    orchestrator: {
      analyze: async (name) => validateCompanyName(name).map(analysisFor),
    },
    speechRenderer: {
      render: async (text, request) => ({
        audio: { ...audio, sourceText: text, languageCode: request?.language ?? "hi" },
        issues: [],
      }),
    },
    ...overrides,
  });

const postJson = (body: unknown) => ({
  method: "POST",
  headers: { "content-type": "application/json" },
  body: JSON.stringify(body),
});

describe("createHttpApp", () => {
  it("reports health", async () => {
    const response = await makeApp().request("/health");

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({ status: "healthy" });
  });

  it("lists configured companies", async () => {
    const response = await makeApp().request("/companies");

    expect(await response.json()).toEqual({ companies: ["Tesla", "Apple"] });
  });

  it("returns the analysis for a valid company", async () => {
    const response = await makeApp().request(
      "/analyze",
      postJson({ company_name: "  Tesla " }),
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toMatchObject({
      report: { companyName: "Tesla", overallSignal: "Neutral" },
      audio: { audioRef: "memory://clip-1" },
      degraded: true,
    });
  });

  it("rejects an empty company name with 400", async () => {
    const response = await makeApp().request(
      "/analyze",
      postJson({ company_name: "   " }),
    );

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: { code: "invalid_input", message: "company_name must not be empty." },
    });
  });

  it("rejects a missing company name with 400", async () => {
    const response = await makeApp().request("/analyze", postJson({}));

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: { code: "invalid_input", message: "company_name must be a string." },
    });
  });

  it("rejects a body that is not JSON", async () => {
    const response = await makeApp().request("/analyze", {
      method: "POST",
      headers: { "content-type": "application/json" },
      body: "company_name=Tesla",
    });

    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      error: {
        code: "invalid_input",
        message: "Request body must be a JSON object with company_name.",
      },
    });
  });

  it("maps cancellation to 499 and internal errors to 500", async () => {
    const cancelled = makeApp({
      orchestrator: {
        analyze: async () => err({ code: "cancelled", message: "Analysis was cancelled." }),
      },
    });
    const broken = makeApp({
      orchestrator: {
        analyze: async () =>
          err({ code: "internal_error", message: "Analysis failed unexpectedly." }),
      },
    });

    const cancelledResponse = await cancelled.request(
      "/analyze",
      postJson({ company_name: "Tesla" }),
    );
    const brokenResponse = await broken.request(
      "/analyze",
      postJson({ company_name: "Tesla" }),
    );

    expect(cancelledResponse.status).toBe(499);
    expect(brokenResponse.status).toBe(500);
    expect(await brokenResponse.json()).toEqual({
      error: { code: "internal_error", message: "Analysis failed unexpectedly." },
    });
  });

  it("answers 500 when a handler throws", async () => {
    const app = makeApp({
      orchestrator: {
        analyze: async () => {
          throw new Error("boom");
        },
      },
    });

    const response = await app.request("/analyze", postJson({ company_name: "Tesla" }));

    expect(response.status).toBe(500);
    expect(await response.json()).toEqual({
      error: { code: "internal_error", message: "Internal server error." },
    });
  });

  it("renders speech for posted text", async () => {
    const response = await makeApp().request(
      "/tts",
      postJson({ text: "Hello there", language: "en" }),
    );

    expect(response.status).toBe(200);
    expect(await response.json()).toEqual({
      ...audio,
      sourceText: "Hello there",
      languageCode: "en",
    });
  });

  it("rejects empty or malformed speech requests", async () => {
    const app = makeApp();

    const empty = await app.request("/tts", postJson({ text: "  " }));
    const missing = await app.request("/tts", postJson({ language: "hi" }));
    const badLanguage = await app.request(
      "/tts",
      postJson({ text: "Hi", language: "hindi!" }),
    );

    expect(empty.status).toBe(400);
    expect(await empty.json()).toEqual({
      error: { code: "invalid_input", message: "text must not be empty." },
    });
    expect(await missing.json()).toEqual({
      error: { code: "invalid_input", message: "text is required." },
    });
    expect(badLanguage.status).toBe(400);
  });

  it("answers unknown routes with a JSON 404", async () => {
    const response = await makeApp().request("/nowhere");

    expect(response.status).toBe(404);
    expect(await response.json()).toEqual({
      error: { code: "not_found", message: "No route for GET /nowhere." },
    });
  });
});
