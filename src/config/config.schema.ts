import {
  DEFAULT_LOG_FILE,
  DEFAULT_PRACTICUM_ENDPOINT,
  DEFAULT_REQUEST_TIMEOUT_MS,
  DEFAULT_RETRY_PERIOD_SECONDS
} from "./defaults.js";
import { createAppError, ERROR_CODES } from "../watcher/errors.js";

export type CredentialsConfig = {
  practicum_token: string;
  telegram_token: string;
  telegram_chat_id: string;
};

export type WatcherConfig = CredentialsConfig & {
  practicum_endpoint: string;
  retry_period_seconds: number;
  request_timeout_ms: number;
  log_file: string;
  state_db_path?: string;
};

export type WatcherConfigInput = Partial<WatcherConfig>;

const REQUIRED_ENV_NAMES: [keyof CredentialsConfig, string][] = [
  ["practicum_token", "TOKEN_PRACTICUM"],
  ["telegram_token", "TOKEN_TELEGRAM"],
  ["telegram_chat_id", "TELEGRAM_CHAT_ID"]
];

function invalidValue(label: string, reason: string) {
  return createAppError({
    code: ERROR_CODES.CONFIG_INVALID_VALUE,
    message: `${label} ${reason}`,
    kind: "CONFIG",
    details: { field: label }
  });
}

function normalizePositiveInt(
  value: number | undefined,
  fallback: number,
  label: string
): number {
  if (value === undefined) {
    return fallback;
  }
  if (!Number.isInteger(value) || value <= 0) {
    throw invalidValue(label, "must be a positive integer");
  }
  return value;
}

function normalizeEndpoint(value: string | undefined): string {
  const trimmed = value?.trim();
  if (!trimmed) {
    return DEFAULT_PRACTICUM_ENDPOINT;
  }
  try {
    const url = new URL(trimmed);
    if (url.protocol !== "https:" && url.protocol !== "http:") {
      throw invalidValue("practicum_endpoint", "must be an http(s) URL");
    }
  } catch (error) {
    if (error instanceof TypeError) {
      throw invalidValue("practicum_endpoint", "must be a valid URL");
    }
    throw error;
  }
  return trimmed;
}

export function validateCredentials(
  raw: Partial<CredentialsConfig>
): CredentialsConfig {
  const credentials: CredentialsConfig = {
    practicum_token: raw.practicum_token?.trim() ?? "",
    telegram_token: raw.telegram_token?.trim() ?? "",
    telegram_chat_id: raw.telegram_chat_id?.trim() ?? ""
  };
  const missing = REQUIRED_ENV_NAMES
    .filter(([key]) => !credentials[key])
    .map(([, envName]) => envName);
  if (missing.length > 0) {
    throw createAppError({
      code: ERROR_CODES.CONFIG_MISSING_ENV,
      message: `Missing required environment variables: ${missing.join(", ")}`,
      kind: "CONFIG",
      details: { missing }
    });
  }

  return credentials;
}

export function validateWatcherConfig(raw: WatcherConfigInput): WatcherConfig {
  const credentials = validateCredentials(raw);
  const stateDbPath = raw.state_db_path?.trim();
  const logFile = raw.log_file?.trim();

  return Object.freeze({
    ...credentials,
    practicum_endpoint: normalizeEndpoint(raw.practicum_endpoint),
    retry_period_seconds: normalizePositiveInt(
      raw.retry_period_seconds,
      DEFAULT_RETRY_PERIOD_SECONDS,
      "retry_period_seconds"
    ),
    request_timeout_ms: normalizePositiveInt(
      raw.request_timeout_ms,
      DEFAULT_REQUEST_TIMEOUT_MS,
      "request_timeout_ms"
    ),
    log_file: logFile ? logFile : DEFAULT_LOG_FILE,
    state_db_path: stateDbPath ? stateDbPath : undefined
  });
}
