import { err, ok, type Result } from "neverthrow";
import type {
  AnalysisResult,
  PipelineState,
  StageIssue,
} from "../../core/entities/analysis";
import type { PipelineFailure } from "../../core/entities/appError";
import { logger } from "../../shared/logger/logger";
import { toErrorDetails } from "../../shared/logger/errorDetails";
import { sanitize } from "../../shared/text/textUtils";
import type { ArticleSourceService } from "./articleSourceService";
import type { ComparativeAnalysisService } from "./comparativeAnalysisService";
import type { SentimentService } from "./sentimentService";
import type { SpeechRendererService } from "./speechRendererService";
import type { SummarizerService } from "./summarizerService";

export const MAX_COMPANY_NAME_CHARS = 100;

export type PipelineStages = {
  source: Pick<ArticleSourceService, "fetchArticles">;
  summarizer: Pick<SummarizerService, "summarizeArticles">;
  sentiment: Pick<SentimentService, "classifyArticles">;
  comparative: Pick<ComparativeAnalysisService, "analyze">;
  speech: Pick<SpeechRendererService, "render">;
};

/**
 * Accepts any string with at least one letter or digit and no control characters.
 */
export const validateCompanyName = (
  raw: unknown,
): Result<string, PipelineFailure> => {
  if (typeof raw !== "string") {
    return err({ code: "invalid_input", message: "company_name must be a string." });
  }

  const name = sanitize(raw);
  if (!name) {
    return err({ code: "invalid_input", message: "company_name must not be empty." });
  }

  if (name.length > MAX_COMPANY_NAME_CHARS) {
    return err({
      code: "invalid_input",
      message: `company_name must be at most ${MAX_COMPANY_NAME_CHARS} characters.`,
    });
  }

  if (/\p{Cc}/u.test(name) || !/[\p{L}\p{N}]/u.test(name)) {
    return err({
      code: "invalid_input",
      message: "company_name must contain letters or digits and no control characters.",
    });
  }

  return ok(name);
};

/**
 * Runs one analysis request through every stage in order. Stage failures are absorbed
 * as issues; only invalid input, cancellation and unexpected errors fail the run.
 */
export class AnalysisOrchestratorService {
  constructor(private readonly stages: PipelineStages) {}

  async analyze(
    companyName: unknown,
    request: { signal?: AbortSignal } = {},
  ): Promise<Result<AnalysisResult, PipelineFailure>> {
    const { signal } = request;
    const states: PipelineState[] = [];
    const enter = (state: PipelineState, name?: string): void => {
      states.push(state);
      logger.debug({ companyName: name, state }, "Pipeline state changed");
    };
    const fail = (
      failure: PipelineFailure,
      name?: string,
    ): Result<AnalysisResult, PipelineFailure> => {
      enter("Failed", name);
      return err(failure);
    };
    const cancelled = (name: string): Result<AnalysisResult, PipelineFailure> =>
      fail({ code: "cancelled", message: "Analysis was cancelled by the caller." }, name);

    const validated = validateCompanyName(companyName);
    if (validated.isErr()) {
      logger.info({ reason: validated.error.message }, "Rejected analysis request");
      return fail(validated.error);
    }
    const name = validated.value;

    try {
      if (signal?.aborted) {
        return cancelled(name);
      }

      enter("Fetching", name);
      const fetched = await this.stages.source.fetchArticles(name, { signal });
      if (signal?.aborted) {
        return cancelled(name);
      }

      enter("Summarizing", name);
      const summarized = await this.stages.summarizer.summarizeArticles(
        fetched.articles,
        name,
        signal,
      );
      if (signal?.aborted) {
        return cancelled(name);
      }

      enter("Classifying", name);
      const classified = await this.stages.sentiment.classifyArticles(
        summarized.articles,
        signal,
      );
      if (signal?.aborted) {
        return cancelled(name);
      }

      enter("Comparing", name);
      const report = this.stages.comparative.analyze(name, classified.articles);

      enter("Rendering", name);
      const speech = await this.stages.speech.render(report.narrativeText, { signal });
      if (signal?.aborted) {
        return cancelled(name);
      }

      enter("Done", name);
      const stageIssues: StageIssue[] = [
        ...fetched.issues,
        ...summarized.issues,
        ...classified.issues,
        ...speech.issues,
      ];
      const degraded =
        stageIssues.length > 0 ||
        report.articles.some((article) => article.origin === "synthetic");

      logger.info(
        {
          companyName: name,
          articles: report.articles.length,
          overallSignal: report.overallSignal,
          degraded,
          issues: stageIssues.map((issue) => issue.code),
        },
        "Analysis completed",
      );

      return ok({ report, audio: speech.audio, degraded, stageIssues, states });
    } catch (error) {
      logger.error(
        { companyName: name, error: toErrorDetails(error) },
        "Analysis failed unexpectedly",
      );
      return fail(
        { code: "internal_error", message: "Analysis failed unexpectedly.", cause: error },
        name,
      );
    }
  }
}
