import { readFileSync } from "node:fs";
import Ajv from "ajv/dist/2020";
import type { ErrorObject } from "ajv";
import type { HomeworkStatusesResponse } from "../watcher/types.js";

const schemaPath = new URL(
  "./schema/homework_statuses.schema.json",
  import.meta.url
);
const schema = JSON.parse(readFileSync(schemaPath, "utf-8")) as Record<
  string,
  unknown
>;

const ajv = new Ajv({ allErrors: true, strict: true });
const validateHomeworkStatusesV1 = ajv.compile<HomeworkStatusesResponse>(schema);

export type SchemaValidationResult =
  | { ok: true; value: HomeworkStatusesResponse }
  | { ok: false; errors: ErrorObject[] };

export function validateHomeworkStatusesSchema(
  input: unknown
): SchemaValidationResult {
  if (validateHomeworkStatusesV1(input)) {
    return { ok: true, value: input };
  }

  const errors = validateHomeworkStatusesV1.errors
    ? validateHomeworkStatusesV1.errors.slice()
    : [];
  return { ok: false, errors };
}
