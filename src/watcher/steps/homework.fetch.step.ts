import type { PracticumClient } from "../../providers/practicum/index.js";

type HomeworkFetchInput = {
  cursor: number;
};

type HomeworkFetchOutput = {
  response: unknown;
};

type HomeworkFetchOptions = {
  client: Pick<PracticumClient, "getHomeworkStatuses">;
};

export async function fetchHomeworkStatuses(
  input: HomeworkFetchInput,
  options: HomeworkFetchOptions
): Promise<HomeworkFetchOutput> {
  const response = await options.client.getHomeworkStatuses(input.cursor);
  return { response };
}

export type { HomeworkFetchInput, HomeworkFetchOutput, HomeworkFetchOptions };
