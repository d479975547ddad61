import "dotenv/config";
import { startHomeworkWatcher } from "./app.js";
import { DEFAULT_LOG_FILE } from "./config/defaults.js";
import { AppError } from "./watcher/errors.js";
import { createLogger } from "./utils/logger.js";

const logger = createLogger({
  filePath: process.env.LOG_FILE?.trim() || DEFAULT_LOG_FILE
});
const controller = new AbortController();

for (const signal of ["SIGINT", "SIGTERM"] as const) {
  process.once(signal, () => {
    logger.info({ message: "watcher.shutdown_requested", signal });
    controller.abort();
  });
}

startHomeworkWatcher({ logger, signal: controller.signal }).catch((error) => {
  logger.critical({
    message: "watcher.start_failed",
    error: error instanceof Error ? error.message : String(error),
    details: error instanceof AppError ? error.details : undefined
  });
  process.exit(1);
});
