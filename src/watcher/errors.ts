import { isPlainObject } from "../utils/guards.js";

export type ErrorKind =
  | "CONFIG"
  | "CONNECTION"
  | "SERVER_RESPONSE"
  | "TYPE_MISMATCH"
  | "MISSING_FIELD"
  | "UNKNOWN_STATUS"
  | "SEND";

export class AppError extends Error {
  readonly code: string;
  readonly kind: ErrorKind;
  readonly details?: Record<string, unknown>;

  constructor(params: {
    code: string;
    message: string;
    kind: ErrorKind;
    details?: Record<string, unknown>;
    cause?: unknown;
  }) {
    super(params.message, { cause: params.cause });
    this.name = "AppError";
    this.code = params.code;
    this.kind = params.kind;
    this.details = params.details;
  }
}

export const ERROR_CODES = {
  CONFIG_MISSING_ENV: "CONFIG_MISSING_ENV",
  CONFIG_INVALID_VALUE: "CONFIG_INVALID_VALUE",
  PROVIDER_PRACTICUM_CONNECTION_FAILED: "PROVIDER_PRACTICUM_CONNECTION_FAILED",
  PROVIDER_PRACTICUM_TIMEOUT: "PROVIDER_PRACTICUM_TIMEOUT",
  PROVIDER_PRACTICUM_BAD_STATUS: "PROVIDER_PRACTICUM_BAD_STATUS",
  PROVIDER_PRACTICUM_INVALID_JSON: "PROVIDER_PRACTICUM_INVALID_JSON",
  STEP_RESPONSE_CHECK_NOT_OBJECT: "STEP_RESPONSE_CHECK_NOT_OBJECT",
  STEP_RESPONSE_CHECK_MISSING_FIELD: "STEP_RESPONSE_CHECK_MISSING_FIELD",
  STEP_RESPONSE_CHECK_INVALID_TYPE: "STEP_RESPONSE_CHECK_INVALID_TYPE",
  STEP_STATUS_PARSE_NOT_OBJECT: "STEP_STATUS_PARSE_NOT_OBJECT",
  STEP_STATUS_PARSE_INVALID_TYPE: "STEP_STATUS_PARSE_INVALID_TYPE",
  STEP_STATUS_PARSE_MISSING_FIELD: "STEP_STATUS_PARSE_MISSING_FIELD",
  STEP_STATUS_PARSE_UNKNOWN_STATUS: "STEP_STATUS_PARSE_UNKNOWN_STATUS",
  PROVIDER_TG_SEND_FAILED: "PROVIDER_TG_SEND_FAILED"
} as const;

export function createAppError(params: {
  code: string;
  message: string;
  kind: ErrorKind;
  details?: Record<string, unknown>;
  cause?: unknown;
}): AppError {
  return new AppError(params);
}

export function describeError(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Text of `error.cause`, e.g. the socket error behind undici's
 * `TypeError("fetch failed")`.
 */
export function describeCause(error: unknown): string | undefined {
  if (!(error instanceof Error) || error.cause === undefined || error.cause === null) {
    return undefined;
  }
  const cause = error.cause;
  const message = cause instanceof Error ? cause.message : undefined;
  const code =
    isPlainObject(cause) && typeof cause.code === "string" ? cause.code : undefined;
  if (message && code && !message.includes(code)) {
    return `${code}: ${message}`;
  }
  return message ?? code ?? String(cause);
}
