export const HOMEWORK_VERDICTS = {
  approved: "Работа проверена: ревьюеру всё понравилось. Ура!",
  reviewing: "Работа взята на проверку ревьюером.",
  rejected: "Работа проверена: у ревьюера есть замечания."
} as const;

export type HomeworkStatus = keyof typeof HOMEWORK_VERDICTS;

export type HomeworkRecord = {
  homework_name: string;
  status: HomeworkStatus;
};

export type HomeworkStatusesResponse = {
  homeworks: unknown[];
  current_date: number;
};

export type WatcherState = {
  last_status: string | null;
  cursor: number;
};

export type PollCycleResult =
  | { outcome: "empty"; current_date: number }
  | { outcome: "unchanged"; status: HomeworkStatus }
  | { outcome: "notified"; status: HomeworkStatus; message: string }
  | { outcome: "failed"; error: string; alert_sent: boolean };
