import "dotenv/config";
import { z } from "zod";

const supportedNewsProviders = ["google-news", "newsapi", "mock"] as const;
const supportedSummarizerProviders = ["huggingface", "ollama", "none"] as const;

export type NewsProviderName = (typeof supportedNewsProviders)[number];
export type SummarizerProviderName =
  (typeof supportedSummarizerProviders)[number];

const envSchema = z.object({
  NODE_ENV: z
    .enum(["development", "test", "production"])
    .default("development"),
  LOG_LEVEL: z
    .enum(["fatal", "error", "warn", "info", "debug", "trace", "silent"])
    .optional(),
  HTTP_HOST: z.string().default("0.0.0.0"),
  HTTP_PORT: z.coerce.number().int().positive().default(8000),
  PUBLIC_BASE_URL: z.string().url().default("http://localhost:8000"),
  APP_COMPANIES: z
    .string()
    .default(
      "Tesla,Apple,Microsoft,Google,Amazon,Reliance Industries,Infosys,Tata Motors",
    ),
  MAX_ARTICLES: z.coerce.number().int().positive().default(10),
  MIN_LIVE_ARTICLES: z.coerce.number().int().nonnegative().default(1),
  NEWS_PROVIDERS: z.string().default("google-news"),
  NEWS_SOURCES: z
    .string()
    .default(
      "reuters.com,bloomberg.com,economictimes.indiatimes.com,moneycontrol.com,livemint.com",
    ),
  GOOGLE_NEWS_BASE_URL: z.string().default("https://news.google.com"),
  NEWS_API_BASE_URL: z.string().default("https://newsapi.org"),
  NEWS_API_KEY: z.string().default(""),
  NEWS_FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  NEWS_FETCH_CONCURRENCY: z.coerce.number().int().positive().default(3),
  SUMMARIZER_PROVIDER: z.enum(supportedSummarizerProviders).default("huggingface"),
  HF_BASE_URL: z.string().default("https://api-inference.huggingface.co"),
  HF_API_TOKEN: z.string().default(""),
  SUMMARIZATION_MODEL: z.string().default("facebook/bart-large-cnn"),
  SENTIMENT_MODEL: z
    .string()
    .default("nlptown/bert-base-multilingual-uncased-sentiment"),
  MODEL_TIMEOUT_MS: z.coerce.number().int().positive().default(30_000),
  OLLAMA_BASE_URL: z.string().default("http://localhost:11434"),
  OLLAMA_CHAT_MODEL: z.string().default("qwen2.5:7b-instruct"),
  SUMMARY_MAX_CHARS: z.coerce.number().int().min(80).default(400),
  SUMMARY_SENTENCES: z.coerce.number().int().positive().default(3),
  TOPICS_PER_ARTICLE: z.coerce.number().int().positive().default(5),
  ARTICLE_CONCURRENCY: z.coerce.number().int().positive().default(2),
  TRANSLATE_BASE_URL: z.string().default("https://translate.googleapis.com"),
  TRANSLATION_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  TTS_BASE_URL: z.string().default("https://translate.google.com"),
  TTS_LANGUAGE: z.string().min(2).default("hi"),
  TTS_TIMEOUT_MS: z.coerce.number().int().positive().default(15_000),
  TTS_MAX_CHUNK_CHARS: z.coerce.number().int().min(20).max(200).default(200),
  TTS_MAX_CHUNKS: z.coerce.number().int().positive().default(20),
  AUDIO_OUTPUT_DIR: z.string().default("static/audio"),
  AUDIO_MAX_AGE_HOURS: z.coerce.number().positive().default(24),
  BOUNDARY_RETRIES: z.coerce.number().int().nonnegative().default(1),
});

export type AppEnv = z.infer<typeof envSchema>;

/**
 * Parses a variable map against the schema; defaults fill anything unset.
 */
export const parseEnv = (source: NodeJS.ProcessEnv): Readonly<AppEnv> =>
  Object.freeze(envSchema.parse(source));

export const env: Readonly<AppEnv> = parseEnv(process.env);

const splitList = (value: string): string[] =>
  value
    .split(",")
    .map((item) => item.trim())
    .filter(Boolean);

/**
 * Supported company names, trimmed and deduplicated case-insensitively in configured order.
 */
export const appCompanies = (config: Readonly<AppEnv> = env): string[] => {
  const seen = new Set<string>();

  return splitList(config.APP_COMPANIES).filter((name) => {
    const key = name.toLowerCase();
    if (seen.has(key)) {
      return false;
    }

    seen.add(key);
    return true;
  });
};

/**
 * Resolves active news providers; unknown names are ignored and an empty list falls back to the mock provider.
 */
export const newsProviders = (
  config: Readonly<AppEnv> = env,
): NewsProviderName[] => {
  const validProviders = splitList(config.NEWS_PROVIDERS.toLowerCase()).filter(
    (name): name is NewsProviderName =>
      supportedNewsProviders.some((supported) => supported === name),
  );

  if (validProviders.length === 0) {
    return ["mock"];
  }

  return Array.from(new Set(validProviders));
};

export const newsSources = (config: Readonly<AppEnv> = env): string[] =>
  splitList(config.NEWS_SOURCES.toLowerCase());
