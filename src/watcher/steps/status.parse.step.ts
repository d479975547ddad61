import { createAppError, ERROR_CODES } from "../errors.js";
import { HOMEWORK_VERDICTS } from "../types.js";
import type { HomeworkRecord, HomeworkStatus } from "../types.js";
import { isPlainObject } from "../../utils/guards.js";
import type { Logger } from "../../utils/logger.js";

type StatusParseOutput = HomeworkRecord & {
  message: string;
};

type StatusParseOptions = {
  logger?: Logger;
};

function isHomeworkStatus(value: unknown): value is HomeworkStatus {
  return typeof value === "string" && Object.hasOwn(HOMEWORK_VERDICTS, value);
}

function missingField(field: string) {
  return createAppError({
    code: ERROR_CODES.STEP_STATUS_PARSE_MISSING_FIELD,
    message: `Homework has no "${field}" field`,
    kind: "MISSING_FIELD",
    details: { field }
  });
}

export function formatStatusMessage(record: HomeworkRecord): string {
  const verdict = HOMEWORK_VERDICTS[record.status];
  return `Изменился статус проверки работы "${record.homework_name}". ${verdict}`;
}

export function parseStatus(
  homework: unknown,
  options: StatusParseOptions = {}
): StatusParseOutput {
  if (!isPlainObject(homework)) {
    throw createAppError({
      code: ERROR_CODES.STEP_STATUS_PARSE_NOT_OBJECT,
      message: "Homework entry must be an object",
      kind: "TYPE_MISMATCH",
      details: {
        received:
          homework === null ? "null" : Array.isArray(homework) ? "array" : typeof homework
      }
    });
  }

  const name = homework.homework_name;
  if (name === undefined || name === null) {
    throw missingField("homework_name");
  }
  if (typeof name !== "string") {
    throw createAppError({
      code: ERROR_CODES.STEP_STATUS_PARSE_INVALID_TYPE,
      message: "Homework field \"homework_name\" must be a string",
      kind: "TYPE_MISMATCH",
      details: { field: "homework_name", received: typeof name }
    });
  }

  const status = homework.status;
  if (status === undefined || status === null) {
    throw missingField("status");
  }
  if (!isHomeworkStatus(status)) {
    throw createAppError({
      code: ERROR_CODES.STEP_STATUS_PARSE_UNKNOWN_STATUS,
      message: `Unknown homework status: ${String(status)}`,
      kind: "UNKNOWN_STATUS",
      details: { homework_name: name, status }
    });
  }

  const record: HomeworkRecord = { homework_name: name, status };
  options.logger?.info({
    message: "status.parse.success",
    homework_name: name,
    status
  });
  return { ...record, message: formatStatusMessage(record) };
}

export type { StatusParseOutput, StatusParseOptions };
