import { Command, InvalidArgumentError } from "commander";
import { createRuntime } from "../application/bootstrap/runtimeFactory";
import type { AnalysisResult } from "../core/entities/analysis";
import { SENTIMENT_LABELS } from "../core/entities/article";
import { startServer } from "../api/server";
import {
  appCompanies,
  env,
  newsProviders,
  newsSources,
} from "../shared/config/env";
import { logger } from "../shared/logger/logger";
import { toErrorDetails } from "../shared/logger/errorDetails";

const HOUR_MS = 60 * 60 * 1000;

const parsePositiveNumber = (value: string): number => {
  const parsed = Number(value);
  if (!Number.isFinite(parsed) || parsed <= 0) {
    throw new InvalidArgumentError("Expected a positive number.");
  }

  return parsed;
};

/**
 * Formats an analysis into a compact terminal report for manual inspection.
 */
export const formatAnalysisReport = (analysis: AnalysisResult): string => {
  const { report, audio } = analysis;
  const lines: string[] = [];

  lines.push(`Analysis for ${report.companyName}`);
  lines.push(`Overall sentiment: ${report.overallSignal}`);
  lines.push(
    `Distribution: ${SENTIMENT_LABELS.map((label) => `${label}=${report.sentimentDistribution[label]}`).join(", ")}`,
  );
  lines.push(`Degraded: ${analysis.degraded ? "yes" : "no"}`);
  lines.push(`States: ${analysis.states.join(" -> ")}`);
  lines.push("");
  lines.push("Narrative:");
  lines.push(report.narrativeText);
  lines.push("");

  lines.push("Articles:");
  if (report.articles.length === 0) {
    lines.push("- none");
  } else {
    report.articles.forEach((article, index) => {
      const published = article.publishedAt ? `, ${article.publishedAt.slice(0, 10)}` : "";
      lines.push(
        `${index + 1}. [${article.sentiment} ${article.sentimentConfidence.toFixed(2)} ${article.sentimentMethod}] ${article.title} (${article.sourceName}${published})`,
      );
      lines.push(`   Summary: ${article.summary}`);
      lines.push(`   Topics: ${article.topics.length > 0 ? article.topics.join(", ") : "none"}`);
      lines.push(`   ${article.url || "(no url)"}`);
    });
  }

  lines.push("");
  lines.push("Common topics:");
  if (report.commonTopics.length === 0) {
    lines.push("- none");
  } else {
    report.commonTopics.forEach((topic) => lines.push(`- ${topic}`));
  }

  lines.push("");
  lines.push("Coverage differences:");
  if (report.coverageDifferences.length === 0) {
    lines.push("- none");
  } else {
    report.coverageDifferences.forEach((difference) => {
      lines.push(`- ${difference.comparison}`);
      lines.push(`  ${difference.impact}`);
    });
  }

  lines.push("");
  lines.push("Stage issues:");
  if (analysis.stageIssues.length === 0) {
    lines.push("- none");
  } else {
    analysis.stageIssues.forEach((issue) => {
      lines.push(
        `- stage=${issue.stage}, code=${issue.code}${issue.provider ? `, provider=${issue.provider}` : ""}, reason=${issue.reason}`,
      );
    });
  }

  lines.push("");
  lines.push("Audio:");
  lines.push(
    `- language=${audio.languageCode}, contentType=${audio.contentType}, bytes=${audio.byteLength}, fallback=${audio.isFallback ? "yes" : "no"}`,
  );
  if (audio.fallbackReason) {
    lines.push(`- reason=${audio.fallbackReason}`);
  }
  lines.push(`- ${audio.audioRef.startsWith("data:") ? "(inline data URI)" : audio.audioRef}`);

  return lines.join("\n");
};

/**
 * Defines a single command surface so the server and one-off runs share the same runtime wiring.
 */
export const buildCli = () => {
  const cli = new Command();
  cli
    .name("company-news-sentiment")
    .description("Company news comparative sentiment analysis CLI");

  cli
    .command("serve")
    .description("Start the HTTP API")
    .action(async () => {
      const server = await startServer(createRuntime());
      const shutdown = (signal: string) => {
        logger.info({ signal }, "HTTP server shutting down");
        server.close();
      };
      process.once("SIGINT", shutdown);
      process.once("SIGTERM", shutdown);
    });

  cli
    .command("analyze")
    .requiredOption("--company <name>", "Company name")
    .option("--prettify", "Render a human-friendly report")
    .action(async (opts: { company: string; prettify?: boolean }) => {
      const runtime = createRuntime();
      const controller = new AbortController();
      const onInterrupt = () => controller.abort();
      process.once("SIGINT", onInterrupt);

      const result = await runtime.orchestrator.analyze(opts.company, {
        signal: controller.signal,
      });
      process.off("SIGINT", onInterrupt);

      if (result.isErr()) {
        const { code, message, cause } = result.error;
        logger.error(
          { code, message, ...(cause === undefined ? {} : { cause: toErrorDetails(cause) }) },
          "Analysis failed",
        );
        process.exitCode = 1;
        return;
      }

      if (opts.prettify) {
        console.log(formatAnalysisReport(result.value));
      } else {
        logger.info({ analysis: result.value }, "Analysis result");
      }
    });

  cli
    .command("companies")
    .description("List configured companies")
    .action(() => {
      appCompanies().forEach((company) => console.log(company));
    });

  cli
    .command("cleanup-audio")
    .description("Delete stored audio older than the retention window")
    .option(
      "--max-age-hours <hours>",
      "Override AUDIO_MAX_AGE_HOURS",
      parsePositiveNumber,
    )
    .action(async (opts: { maxAgeHours?: number }) => {
      const runtime = createRuntime();
      const maxAgeMs = opts.maxAgeHours ? opts.maxAgeHours * HOUR_MS : runtime.audioMaxAgeMs;
      const removed = await runtime.audioStore.cleanupOlderThan(maxAgeMs);
      logger.info(
        { removed, maxAgeMs, directory: runtime.config.AUDIO_OUTPUT_DIR },
        "Audio cleanup finished",
      );
    });

  cli
    .command("status")
    .description("Report runtime configuration")
    .action(() => {
      logger.info(
        {
          companies: appCompanies(),
          newsProviders: newsProviders(),
          newsSources: newsSources(),
          maxArticles: env.MAX_ARTICLES,
          summarizerProvider: env.SUMMARIZER_PROVIDER,
          summarizationModel: env.SUMMARIZATION_MODEL,
          sentimentModel: env.SENTIMENT_MODEL,
          huggingFaceTokenSet: Boolean(env.HF_API_TOKEN),
          ollama: env.OLLAMA_BASE_URL,
          ttsLanguage: env.TTS_LANGUAGE,
          audioDir: env.AUDIO_OUTPUT_DIR,
          audioMaxAgeHours: env.AUDIO_MAX_AGE_HOURS,
          http: `${env.HTTP_HOST}:${env.HTTP_PORT}`,
          startupWorkflow: [
            "npm start",
            "npm run cli -- analyze --company Tesla --prettify",
          ],
          troubleshooting: [
            "Without HF_API_TOKEN summaries are extractive and sentiment is keyword-only.",
            "Set NEWS_PROVIDERS=mock to run without network access.",
            "A degraded result lists every fallback under stageIssues.",
          ],
        },
        "Runtime status",
      );
    });

  return cli;
};

/**
 * Keeps process bootstrap thin by delegating argument parsing and command routing to one entry point.
 */
export const runCli = async (argv: string[]): Promise<void> => {
  const cli = buildCli();
  await cli.parseAsync(argv);
};
