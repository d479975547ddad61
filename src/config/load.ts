import { validateWatcherConfig } from "./config.schema.js";
import type { WatcherConfig } from "./config.schema.js";

export function parseIntegerEnv(raw: string | undefined): number | undefined {
  const trimmed = raw?.trim();
  if (!trimmed) {
    return undefined;
  }
  return Number(trimmed);
}

export function loadWatcherConfig(
  env: NodeJS.ProcessEnv = process.env
): WatcherConfig {
  return validateWatcherConfig({
    practicum_token: env.TOKEN_PRACTICUM,
    telegram_token: env.TOKEN_TELEGRAM,
    telegram_chat_id: env.TELEGRAM_CHAT_ID,
    practicum_endpoint: env.PRACTICUM_ENDPOINT,
    retry_period_seconds: parseIntegerEnv(env.RETRY_PERIOD_SECONDS),
    request_timeout_ms: parseIntegerEnv(env.REQUEST_TIMEOUT_MS),
    log_file: env.LOG_FILE,
    state_db_path: env.STATE_DB_PATH
  });
}
