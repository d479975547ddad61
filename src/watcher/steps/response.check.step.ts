import { createAppError } from "../errors.js";
import { validateHomeworkStatuses } from "../../validator/index.js";
import type { Logger } from "../../utils/logger.js";

type ResponseCheckOutput =
  | { found: false; current_date: number }
  | { found: true; homework: unknown; current_date: number };

type ResponseCheckOptions = {
  logger?: Logger;
};

/**
 * Validates the upstream payload and picks the most recent homework.
 * An empty `homeworks` list yields `found: false` instead of an error.
 */
export function checkResponse(
  response: unknown,
  options: ResponseCheckOptions = {}
): ResponseCheckOutput {
  const result = validateHomeworkStatuses(response);
  if (!result.ok) {
    throw createAppError({
      code: result.code,
      message: result.message,
      kind: result.kind,
      details: result.details
    });
  }

  const { homeworks, current_date } = result.response;
  if (homeworks.length === 0) {
    options.logger?.info({
      message: "response.check.empty_homeworks",
      current_date
    });
    return { found: false, current_date };
  }

  return { found: true, homework: homeworks[0], current_date };
}

export type { ResponseCheckOutput, ResponseCheckOptions };
