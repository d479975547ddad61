import {
  createAppError,
  describeCause,
  describeError,
  ERROR_CODES
} from "../../watcher/errors.js";
import { DEFAULT_PRACTICUM_ENDPOINT, DEFAULT_REQUEST_TIMEOUT_MS } from "../../config/defaults.js";
import type { Logger } from "../../utils/logger.js";

type FetchResponse = {
  ok: boolean;
  status: number;
  statusText: string;
  text(): Promise<string>;
};

type FetchLike = (input: string, init?: RequestInit) => Promise<FetchResponse>;

export type PracticumClient = {
  getHomeworkStatuses(fromDate: number): Promise<unknown>;
};

export type PracticumClientOptions = {
  token: string;
  logger: Logger;
  endpoint?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
  now?: () => number;
};

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

function isEmptyPayload(payload: unknown): boolean {
  if (Array.isArray(payload)) {
    return payload.length === 0;
  }
  if (payload && typeof payload === "object") {
    return Object.keys(payload).length === 0;
  }
  return payload === null || payload === undefined;
}

function buildUrl(endpoint: string, fromDate: number): string {
  const url = new URL(endpoint);
  url.searchParams.set("from_date", String(fromDate));
  return url.toString();
}

export function createPracticumClient(
  options: PracticumClientOptions
): PracticumClient {
  const fetchImpl: FetchLike = options.fetch ?? fetch;
  const endpoint = options.endpoint ?? DEFAULT_PRACTICUM_ENDPOINT;
  const timeoutMs = options.timeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
  const now = options.now ?? unixNow;
  const logger = options.logger;

  return {
    async getHomeworkStatuses(fromDate: number): Promise<unknown> {
      const timestamp = fromDate || now();
      const url = buildUrl(endpoint, timestamp);
      logger.info({
        message: "practicum.request",
        endpoint,
        from_date: timestamp
      });

      const controller = new AbortController();
      const timeout = setTimeout(() => controller.abort(), timeoutMs);
      let response: FetchResponse;
      let body: string;
      try {
        response = await fetchImpl(url, {
          method: "GET",
          headers: { Authorization: `OAuth ${options.token}` },
          signal: controller.signal
        });
        body = await response.text();
      } catch (error) {
        if (error instanceof Error && error.name === "AbortError") {
          throw createAppError({
            code: ERROR_CODES.PROVIDER_PRACTICUM_TIMEOUT,
            message: `Practicum API request timed out after ${timeoutMs} ms`,
            kind: "CONNECTION",
            details: { endpoint, timeout_ms: timeoutMs },
            cause: error
          });
        }
        const cause = describeCause(error);
        throw createAppError({
          code: ERROR_CODES.PROVIDER_PRACTICUM_CONNECTION_FAILED,
          message: cause
            ? `Practicum API connection failed: ${describeError(error)} (${cause})`
            : `Practicum API connection failed: ${describeError(error)}`,
          kind: "CONNECTION",
          details: cause ? { endpoint, cause } : { endpoint },
          cause: error
        });
      } finally {
        clearTimeout(timeout);
      }

      if (!response.ok) {
        throw createAppError({
          code: ERROR_CODES.PROVIDER_PRACTICUM_BAD_STATUS,
          message: `Practicum API responded with ${response.status} ${response.statusText}`,
          kind: "SERVER_RESPONSE",
          details: {
            status: response.status,
            reason: response.statusText,
            body
          }
        });
      }

      let payload: unknown;
      try {
        payload = JSON.parse(body);
      } catch (error) {
        throw createAppError({
          code: ERROR_CODES.PROVIDER_PRACTICUM_INVALID_JSON,
          message: "Practicum API returned a body that is not JSON",
          kind: "SERVER_RESPONSE",
          details: {
            status: response.status,
            reason: response.statusText,
            body
          },
          cause: error
        });
      }

      if (isEmptyPayload(payload)) {
        logger.info({
          message: "practicum.response.empty",
          from_date: timestamp
        });
      }
      return payload;
    }
  };
}
