export const DEFAULT_PRACTICUM_ENDPOINT =
  "https://practicum.yandex.ru/api/user_api/homework_statuses/";

export const DEFAULT_RETRY_PERIOD_SECONDS = 600;

export const DEFAULT_REQUEST_TIMEOUT_MS = 15000;

export const DEFAULT_LOG_FILE = "info.log";
