import { loadWatcherConfig } from "./config/load.js";
import type { WatcherConfig } from "./config/config.schema.js";
import { createPracticumClient } from "./providers/practicum/index.js";
import { createTelegramNotifier } from "./providers/telegram/index.js";
import type { TelegramTransport } from "./providers/telegram/index.js";
import type { PracticumClientOptions } from "./providers/practicum/index.js";
import { createStateStore } from "./storage/index.js";
import type { StateStore } from "./storage/index.js";
import { createLogger } from "./utils/logger.js";
import type { Logger } from "./utils/logger.js";
import { runWatcher } from "./watcher/loop.js";
import type { WatcherOptions } from "./watcher/loop.js";
import type { WatcherState } from "./watcher/types.js";

export type HomeworkWatcherOptions = {
  env?: NodeJS.ProcessEnv;
  logger?: Logger;
  fetch?: PracticumClientOptions["fetch"];
  transport?: TelegramTransport;
  store?: StateStore;
  signal?: AbortSignal;
  sleep?: WatcherOptions["sleep"];
  now?: () => number;
};

/**
 * Loads the configuration, wires the providers and runs the poll loop
 * until `signal` aborts. Configuration errors are thrown before any
 * request is made.
 */
export async function startHomeworkWatcher(
  options: HomeworkWatcherOptions = {}
): Promise<WatcherState> {
  const config: WatcherConfig = loadWatcherConfig(options.env);
  const logger = options.logger ?? createLogger({ filePath: config.log_file });
  const client = createPracticumClient({
    token: config.practicum_token,
    endpoint: config.practicum_endpoint,
    timeoutMs: config.request_timeout_ms,
    logger,
    fetch: options.fetch
  });
  const notifier = createTelegramNotifier({
    bot_token: config.telegram_token,
    chat_id: config.telegram_chat_id,
    logger,
    transport: options.transport
  });
  const store =
    options.store ?? (await createStateStore({ state_db_path: config.state_db_path }));

  try {
    return await runWatcher({
      client,
      notifier,
      store,
      logger,
      retryPeriodMs: config.retry_period_seconds * 1000,
      signal: options.signal,
      sleep: options.sleep,
      now: options.now
    });
  } finally {
    store.close();
  }
}
