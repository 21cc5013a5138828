import { Hono } from "hono";
import { cors } from "hono/cors";
import { serveStatic } from "@hono/node-server/serve-static";
import { z } from "zod";
import type { PipelineFailure, PipelineFailureCode } from "../core/entities/appError";
import type { AnalysisOrchestratorService } from "../application/services/analysisOrchestratorService";
import type { SpeechRendererService } from "../application/services/speechRendererService";
import { AUDIO_ROUTE_PREFIX } from "../infra/storage/fileAudioStore";
import { logger } from "../shared/logger/logger";
import { toErrorDetails } from "../shared/logger/errorDetails";

export type HttpAppDependencies = {
  companies: readonly string[];
  orchestrator: Pick<AnalysisOrchestratorService, "analyze">;
  speechRenderer: Pick<SpeechRendererService, "render">;
  audioDir?: string;
};

type ErrorCode = PipelineFailureCode | "not_found";

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_input: 400,
  not_found: 404,
  cancelled: 499,
  internal_error: 500,
};

const analyzeBodySchema = z.object({
  company_name: z.unknown(),
});

const ttsBodySchema = z.object({
  text: z.string({
    required_error: "text is required.",
    invalid_type_error: "text must be a string.",
  }),
  language: z
    .string()
    .regex(/^[a-z]{2,3}(-[a-z]{2,4})?$/i, "language must be a language code such as hi or en.")
    .optional(),
});

/**
 * Error payloads go out as plain responses so non-standard statuses such as 499 are allowed.
 */
const errorResponse = (code: ErrorCode, message: string): Response =>
  new Response(JSON.stringify({ error: { code, message } }), {
    status: STATUS_BY_CODE[code],
    headers: { "content-type": "application/json; charset=UTF-8" },
  });

const failureResponse = (failure: PipelineFailure): Response =>
  errorResponse(failure.code, failure.message);

const readJsonBody = async (request: Request): Promise<unknown> => {
  try {
    return await request.json();
  } catch {
    return undefined;
  }
};

const firstIssue = (error: z.ZodError): string =>
  error.issues[0]?.message ?? "Request body is invalid.";

export const createHttpApp = (deps: HttpAppDependencies): Hono => {
  const app = new Hono();

  app.use("*", cors());
  app.use("*", async (c, next) => {
    const startedAt = Date.now();
    await next();
    logger.info(
      {
        method: c.req.method,
        path: c.req.path,
        status: c.res.status,
        durationMs: Date.now() - startedAt,
      },
      "HTTP request",
    );
  });

  app.get("/health", (c) => c.json({ status: "healthy" }));

  app.get("/companies", (c) => c.json({ companies: [...deps.companies] }));

  app.post("/analyze", async (c) => {
    const body = analyzeBodySchema.safeParse(await readJsonBody(c.req.raw));
    if (!body.success) {
      return errorResponse("invalid_input", "Request body must be a JSON object with company_name.");
    }

    const result = await deps.orchestrator.analyze(body.data.company_name, {
      signal: c.req.raw.signal,
    });

    if (result.isErr()) {
      return failureResponse(result.error);
    }

    return c.json(result.value);
  });

  app.post("/tts", async (c) => {
    const body = ttsBodySchema.safeParse(await readJsonBody(c.req.raw));
    if (!body.success) {
      return errorResponse("invalid_input", firstIssue(body.error));
    }

    if (!body.data.text.trim()) {
      return errorResponse("invalid_input", "text must not be empty.");
    }

    const outcome = await deps.speechRenderer.render(body.data.text, {
      language: body.data.language,
      signal: c.req.raw.signal,
    });
    return c.json(outcome.audio);
  });

  if (deps.audioDir) {
    app.use(
      `${AUDIO_ROUTE_PREFIX}/*`,
      serveStatic({
        root: deps.audioDir,
        rewriteRequestPath: (path) => path.slice(AUDIO_ROUTE_PREFIX.length),
      }),
    );
  }

  app.notFound((c) => errorResponse("not_found", `No route for ${c.req.method} ${c.req.path}.`));

  app.onError((error, c) => {
    logger.error({ error: toErrorDetails(error), path: c.req.path }, "Unhandled HTTP error");
    return errorResponse("internal_error", "Internal server error.");
  });

  return app;
};
