import type { Article, SentimentLabel } from "./article";

export type SentimentDistribution = Record<SentimentLabel, number>;

export type TopicOverlap = {
  articleA: string;
  articleB: string;
  sharedTopics: string[];
  uniqueTopicsA: string[];
  uniqueTopicsB: string[];
};

export type CoverageDifference = {
  articleA: string;
  articleB: string;
  comparison: string;
  impact: string;
};

export type ComparativeReport = {
  companyName: string;
  articles: readonly Article[];
  sentimentDistribution: SentimentDistribution;
  topicOverlap: TopicOverlap[];
  commonTopics: string[];
  coverageDifferences: CoverageDifference[];
  overallSignal: SentimentLabel;
  narrativeText: string;
};

export type AudioContentType = "audio/mpeg" | "audio/wav";

export type AudioResult = {
  audioRef: string;
  contentType: AudioContentType;
  byteLength: number;
  languageCode: string;
  sourceText: string;
  isFallback: boolean;
  fallbackReason?: string;
};

export type PipelineStage =
  | "fetch"
  | "summarize"
  | "classify"
  | "compare"
  | "render";

export type StageIssueCode =
  | "source_unavailable"
  | "insufficient_articles"
  | "model_unavailable"
  | "translation_failed"
  | "synthesis_failed";

/**
 * Records one fallback taken by a stage so degraded results stay explainable.
 */
export type StageIssue = {
  stage: PipelineStage;
  code: StageIssueCode;
  reason: string;
  provider?: string;
};

export type PipelineState =
  | "Fetching"
  | "Summarizing"
  | "Classifying"
  | "Comparing"
  | "Rendering"
  | "Done"
  | "Failed";

export type AnalysisResult = {
  report: ComparativeReport;
  audio: AudioResult;
  degraded: boolean;
  stageIssues: StageIssue[];
  states: PipelineState[];
};
