import { serve, type ServerType } from "@hono/node-server";
import type { Runtime } from "../application/bootstrap/runtimeFactory";
import { createHttpApp } from "./httpApp";
import { logger } from "../shared/logger/logger";

/**
 * Sweeps stale audio, then binds the HTTP app. Resolves once the server is listening.
 */
export const startServer = async (runtime: Runtime): Promise<ServerType> => {
  const removed = await runtime.audioStore.cleanupOlderThan(runtime.audioMaxAgeMs);
  logger.info({ removed }, "Stale audio files removed");

  const app = createHttpApp({
    companies: runtime.companies,
    orchestrator: runtime.orchestrator,
    speechRenderer: runtime.speechRenderer,
    audioDir: runtime.config.AUDIO_OUTPUT_DIR,
  });

  return new Promise((resolve) => {
    const server = serve(
      {
        fetch: app.fetch,
        hostname: runtime.config.HTTP_HOST,
        port: runtime.config.HTTP_PORT,
      },
      (info) => {
        logger.info(
          { address: info.address, port: info.port, companies: runtime.companies.length },
          "HTTP server listening",
        );
        resolve(server);
      },
    );
  });
};
