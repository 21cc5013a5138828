import { AnalysisOrchestratorService } from "../services/analysisOrchestratorService";
import { ArticleSourceService } from "../services/articleSourceService";
import { ComparativeAnalysisService } from "../services/comparativeAnalysisService";
import { SentimentService } from "../services/sentimentService";
import { SpeechRendererService } from "../services/speechRendererService";
import { SummarizerService } from "../services/summarizerService";
import {
  appCompanies,
  env,
  newsProviders,
  newsSources,
  type AppEnv,
} from "../../shared/config/env";
import { HuggingFaceInference } from "../../infra/llm/huggingFaceInference";
import { OllamaSummarizer } from "../../infra/llm/ollamaSummarizer";
import { GoogleNewsRssProvider } from "../../infra/providers/googleNews/googleNewsRssProvider";
import { MockNewsProvider } from "../../infra/providers/mocks/mockNewsProvider";
import { NewsApiProvider } from "../../infra/providers/newsapi/newsApiProvider";
import { GoogleTtsClient } from "../../infra/speech/googleTtsClient";
import { noticeClip } from "../../infra/speech/noticeClip";
import { FileAudioStore } from "../../infra/storage/fileAudioStore";
import { SystemClock, UuidIdGenerator } from "../../infra/system/systemPorts";
import { GoogleTranslateClient } from "../../infra/translation/googleTranslateClient";
import type { NewsProviderPort } from "../../core/ports/inboundPorts";
import type {
  AudioStorePort,
  ClockPort,
  SentimentModelPort,
  SummarizationPort,
} from "../../core/ports/outboundPorts";
import { logger } from "../../shared/logger/logger";

const SENTIMENT_CHUNK_CHARS = 512;
const SUMMARY_CHUNK_CHARS = 1_024;
const HOUR_MS = 60 * 60 * 1000;

export type Runtime = {
  config: Readonly<AppEnv>;
  companies: string[];
  orchestrator: AnalysisOrchestratorService;
  speechRenderer: SpeechRendererService;
  audioStore: AudioStorePort;
  audioMaxAgeMs: number;
};

/**
 * One Google News provider per configured domain, plus NewsAPI and the mock wire when selected.
 */
const createNewsProviders = (config: Readonly<AppEnv>, clock: ClockPort): NewsProviderPort[] =>
  newsProviders(config).flatMap((providerName): NewsProviderPort[] => {
    if (providerName === "google-news") {
      return newsSources(config).map(
        (domain) =>
          new GoogleNewsRssProvider(
            config.GOOGLE_NEWS_BASE_URL,
            domain,
            config.NEWS_FETCH_TIMEOUT_MS,
          ),
      );
    }

    if (providerName === "newsapi") {
      return [
        new NewsApiProvider(
          config.NEWS_API_BASE_URL,
          config.NEWS_API_KEY,
          config.NEWS_FETCH_TIMEOUT_MS,
        ),
      ];
    }

    return [new MockNewsProvider(clock)];
  });

const createHuggingFace = (config: Readonly<AppEnv>): HuggingFaceInference | null => {
  if (!config.HF_API_TOKEN) {
    logger.warn("HF_API_TOKEN is not set; model stages will use their fallbacks");
    return null;
  }

  return new HuggingFaceInference(
    config.HF_BASE_URL,
    config.HF_API_TOKEN,
    { summarization: config.SUMMARIZATION_MODEL, sentiment: config.SENTIMENT_MODEL },
    config.MODEL_TIMEOUT_MS,
  );
};

const createSummarizationBackend = (
  config: Readonly<AppEnv>,
  huggingFace: HuggingFaceInference | null,
): SummarizationPort | null => {
  switch (config.SUMMARIZER_PROVIDER) {
    case "ollama":
      return new OllamaSummarizer(
        config.OLLAMA_BASE_URL,
        config.OLLAMA_CHAT_MODEL,
        config.MODEL_TIMEOUT_MS,
      );
    case "huggingface":
      return huggingFace;
    case "none":
      return null;
  }
};

/**
 * Composition root shared by the HTTP server and the CLI. Handles are read-only once built.
 */
export const createRuntime = (config: Readonly<AppEnv> = env): Runtime => {
  const clock = new SystemClock();
  const ids = new UuidIdGenerator();
  const retryPolicy = { retries: config.BOUNDARY_RETRIES, retryDelayMs: 250 };

  const huggingFace = createHuggingFace(config);
  const sentimentModel: SentimentModelPort | null = huggingFace;
  const audioStore = new FileAudioStore(
    config.AUDIO_OUTPUT_DIR,
    config.PUBLIC_BASE_URL,
    ids,
    clock,
  );

  const source = new ArticleSourceService(
    createNewsProviders(config, clock),
    new MockNewsProvider(clock),
    {
      maxArticles: config.MAX_ARTICLES,
      minLiveArticles: config.MIN_LIVE_ARTICLES,
      concurrency: config.NEWS_FETCH_CONCURRENCY,
      timeoutMs: config.NEWS_FETCH_TIMEOUT_MS,
      ...retryPolicy,
    },
  );
  const summarizer = new SummarizerService(
    createSummarizationBackend(config, huggingFace),
    {
      maxChars: config.SUMMARY_MAX_CHARS,
      sentenceCount: config.SUMMARY_SENTENCES,
      topicCount: config.TOPICS_PER_ARTICLE,
      modelChunkChars: SUMMARY_CHUNK_CHARS,
      concurrency: config.ARTICLE_CONCURRENCY,
      timeoutMs: config.MODEL_TIMEOUT_MS,
      ...retryPolicy,
    },
  );
  const sentiment = new SentimentService(sentimentModel, {
    chunkChars: SENTIMENT_CHUNK_CHARS,
    concurrency: config.ARTICLE_CONCURRENCY,
    timeoutMs: config.MODEL_TIMEOUT_MS,
    ...retryPolicy,
  });
  const speechRenderer = new SpeechRendererService(
    new GoogleTranslateClient(config.TRANSLATE_BASE_URL, config.TRANSLATION_TIMEOUT_MS),
    new GoogleTtsClient(config.TTS_BASE_URL, config.TTS_TIMEOUT_MS),
    audioStore,
    noticeClip,
    {
      defaultLanguage: config.TTS_LANGUAGE,
      maxChunkChars: config.TTS_MAX_CHUNK_CHARS,
      maxChunks: config.TTS_MAX_CHUNKS,
      translationTimeoutMs: config.TRANSLATION_TIMEOUT_MS,
      synthesisTimeoutMs: config.TTS_TIMEOUT_MS,
      ...retryPolicy,
    },
  );

  const orchestrator = new AnalysisOrchestratorService({
    source,
    summarizer,
    sentiment,
    comparative: new ComparativeAnalysisService(),
    speech: speechRenderer,
  });

  return {
    config,
    companies: appCompanies(config),
    orchestrator,
    speechRenderer,
    audioStore,
    audioMaxAgeMs: config.AUDIO_MAX_AGE_HOURS * HOUR_MS,
  };
};
