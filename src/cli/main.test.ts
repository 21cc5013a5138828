import { describe, expect, it } from "vitest";
import { buildCli, formatAnalysisReport } from "./main";
import type { AnalysisResult } from "../core/entities/analysis";

const analysis: AnalysisResult = {
  report: {
    companyName: "Tesla",
    articles: [
      {
        id: "a1",
        title: "Tesla opens a new plant",
        url: "https://news.test/1",
        sourceName: "Live Wire",
        provider: "live-wire",
        publishedAt: "2026-02-28T09:30:00.000Z",
        rawText: "Tesla opened a new plant in Texas on schedule.",
        origin: "live",
        summary: "Tesla opened a new plant in Texas.",
        topics: ["plant", "texas"],
        summaryMethod: "model",
        sentiment: "Positive",
        sentimentConfidence: 0.9,
        sentimentMethod: "model",
      },
    ],
    sentimentDistribution: { Positive: 1, Negative: 0, Neutral: 0 },
    topicOverlap: [],
    commonTopics: [],
    coverageDifferences: [],
    overallSignal: "Positive",
    narrativeText: "Only one article about Tesla was analyzed.",
  },
  audio: {
    audioRef: "data:audio/wav;base64,UklGRg==",
    contentType: "audio/wav",
    byteLength: 4844,
    languageCode: "hi",
    sourceText: "Only one article about Tesla was analyzed.",
    isFallback: true,
    fallbackReason: "Speech synthesis failed",
  },
  degraded: true,
  stageIssues: [
    {
      stage: "render",
      code: "synthesis_failed",
      provider: "google-tts",
      reason: "Speech synthesis failed",
    },
  ],
  states: ["Fetching", "Summarizing", "Classifying", "Comparing", "Rendering", "Done"],
};

describe("formatAnalysisReport", () => {
  it("renders every section of the report", () => {
    expect(formatAnalysisReport(analysis).split("\n")).toEqual([
      "Analysis for Tesla",
      "Overall sentiment: Positive",
      "Distribution: Positive=1, Negative=0, Neutral=0",
      "Degraded: yes",
      "States: Fetching -> Summarizing -> Classifying -> Comparing -> Rendering -> Done",
      "",
      "Narrative:",
      "Only one article about Tesla was analyzed.",
      "",
      "Articles:",
      "1. [Positive 0.90 model] Tesla opens a new plant (Live Wire, 2026-02-28)",
      "   Summary: Tesla opened a new plant in Texas.",
      "   Topics: plant, texas",
      "   https://news.test/1",
      "",
      "Common topics:",
      "- none",
      "",
      "Coverage differences:",
      "- none",
      "",
      "Stage issues:",
      "- stage=render, code=synthesis_failed, provider=google-tts, reason=Speech synthesis failed",
      "",
      "Audio:",
      "- language=hi, contentType=audio/wav, bytes=4844, fallback=yes",
      "- reason=Speech synthesis failed",
      "- (inline data URI)",
    ]);
  });
});

describe("buildCli", () => {
  it("registers the operational commands", () => {
    expect(buildCli().commands.map((command) => command.name())).toEqual([
      "serve",
      "analyze",
      "companies",
      "cleanup-audio",
      "status",
    ]);
  });
});
