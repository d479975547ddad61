import type { ErrorObject } from "ajv";
import type { ErrorKind } from "../watcher/errors.js";
import { ERROR_CODES } from "../watcher/errors.js";
import type { HomeworkStatusesResponse } from "../watcher/types.js";
import { validateHomeworkStatusesSchema } from "./ajv.js";
import { isPlainObject } from "../utils/guards.js";

export type ResponseValidationSuccess = {
  ok: true;
  response: HomeworkStatusesResponse;
};

export type ResponseValidationFailure = {
  ok: false;
  kind: Extract<ErrorKind, "TYPE_MISMATCH" | "MISSING_FIELD">;
  code: string;
  message: string;
  details: Record<string, unknown>;
};

export type ResponseValidationResult =
  | ResponseValidationSuccess
  | ResponseValidationFailure;

function describeValue(value: unknown): string {
  if (value === null) {
    return "null";
  }
  return Array.isArray(value) ? "array" : typeof value;
}

function fieldFromPath(instancePath: string): string {
  return instancePath.replace(/^\//, "");
}

function missingField(field: string): ResponseValidationFailure {
  return {
    ok: false,
    kind: "MISSING_FIELD",
    code: ERROR_CODES.STEP_RESPONSE_CHECK_MISSING_FIELD,
    message: `API response has no "${field}" field`,
    details: { field }
  };
}

function toFailure(
  input: Record<string, unknown>,
  errors: ErrorObject[]
): ResponseValidationFailure {
  const missing = errors.find((error) => error.keyword === "required");
  if (missing) {
    return missingField(String(missing.params.missingProperty));
  }

  // null counts as absent, the same way the status parser treats it
  const nullField = errors
    .map((error) => fieldFromPath(error.instancePath))
    .find((field) => field.length > 0 && input[field] === null);
  if (nullField) {
    return missingField(nullField);
  }

  const mismatch = errors.find((error) => error.keyword === "type");
  const field = mismatch ? fieldFromPath(mismatch.instancePath) : "";
  const expected = mismatch ? String(mismatch.params.type) : "valid value";
  return {
    ok: false,
    kind: "TYPE_MISMATCH",
    code: ERROR_CODES.STEP_RESPONSE_CHECK_INVALID_TYPE,
    message: `API response field "${field}" must be ${expected}, got ${describeValue(input[field])}`,
    details: {
      field,
      expected,
      schema_errors: errors.map((error) => ({
        path: error.instancePath,
        keyword: error.keyword,
        message: error.message
      }))
    }
  };
}

export function validateHomeworkStatuses(
  input: unknown
): ResponseValidationResult {
  if (!isPlainObject(input)) {
    return {
      ok: false,
      kind: "TYPE_MISMATCH",
      code: ERROR_CODES.STEP_RESPONSE_CHECK_NOT_OBJECT,
      message: `API response must be an object, got ${describeValue(input)}`,
      details: { received: describeValue(input) }
    };
  }

  const result = validateHomeworkStatusesSchema(input);
  if (result.ok) {
    return { ok: true, response: result.value };
  }
  return toFailure(input, result.errors);
}
