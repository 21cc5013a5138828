import { runCli } from "./cli/main";
import { logger } from "./shared/logger/logger";
import { toErrorDetails } from "./shared/logger/errorDetails";

runCli(process.argv).catch((error) => {
  logger.error({ error: toErrorDetails(error) }, "CLI failed");
  process.exit(1);
});
