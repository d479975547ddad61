import { AppError, describeCause, describeError } from "./errors.js";
import type { PollCycleResult, WatcherState } from "./types.js";
import { fetchHomeworkStatuses } from "./steps/homework.fetch.step.js";
import { checkResponse } from "./steps/response.check.step.js";
import { parseStatus } from "./steps/status.parse.step.js";
import { notifyTelegram } from "./steps/telegram.notify.step.js";
import type { PracticumClient } from "../providers/practicum/index.js";
import type { TelegramNotifier } from "../providers/telegram/index.js";
import type { StateStore } from "../storage/index.js";
import type { Logger } from "../utils/logger.js";

export type WatcherDeps = {
  client: Pick<PracticumClient, "getHomeworkStatuses">;
  notifier: TelegramNotifier;
  store: Pick<StateStore, "load" | "save">;
  logger: Logger;
};

export type WatcherOptions = WatcherDeps & {
  retryPeriodMs: number;
  signal?: AbortSignal;
  now?: () => number;
  sleep?: (ms: number, signal?: AbortSignal) => Promise<void>;
};

export type PollCycleOutput = {
  state: WatcherState;
  result: PollCycleResult;
};

export const FAILURE_MESSAGE_PREFIX = "Сбой в работе программы";

export function formatFailureMessage(error: unknown): string {
  return `${FAILURE_MESSAGE_PREFIX}: ${describeError(error)}`;
}

function unixNow(): number {
  return Math.floor(Date.now() / 1000);
}

/** Resolves after `ms`, or as soon as `signal` aborts. */
export function abortableSleep(ms: number, signal?: AbortSignal): Promise<void> {
  return new Promise((resolve) => {
    if (signal?.aborted) {
      resolve();
      return;
    }
    const done = () => {
      clearTimeout(timer);
      signal?.removeEventListener("abort", done);
      resolve();
    };
    const timer = setTimeout(done, ms);
    signal?.addEventListener("abort", done, { once: true });
  });
}

export function resolveInitialState(
  store: Pick<StateStore, "load">,
  now: () => number = unixNow
): WatcherState {
  return store.load() ?? { last_status: null, cursor: now() };
}

function persistState(deps: WatcherDeps, state: WatcherState): void {
  try {
    deps.store.save(state);
  } catch (error) {
    deps.logger.error({
      message: "watcher.state.save_failed",
      error: describeError(error)
    });
  }
}

async function reportFailure(
  deps: WatcherDeps,
  error: unknown
): Promise<PollCycleResult> {
  const text = formatFailureMessage(error);
  deps.logger.error({
    message: "watcher.cycle.failed",
    text,
    error_code: error instanceof AppError ? error.code : undefined,
    error_kind: error instanceof AppError ? error.kind : undefined,
    details: error instanceof AppError ? error.details : undefined,
    cause: describeCause(error instanceof AppError ? error.cause : error)
  });

  try {
    await deps.notifier.sendMessage(text);
    return { outcome: "failed", error: text, alert_sent: true };
  } catch (alertError) {
    deps.logger.error({
      message: "watcher.alert.failed",
      error: describeError(alertError)
    });
    return { outcome: "failed", error: text, alert_sent: false };
  }
}

export async function runPollCycle(
  state: WatcherState,
  deps: WatcherDeps
): Promise<PollCycleOutput> {
  try {
    const { response } = await fetchHomeworkStatuses(
      { cursor: state.cursor },
      { client: deps.client }
    );
    const checked = checkResponse(response, { logger: deps.logger });
    if (!checked.found) {
      deps.logger.info({
        message: "watcher.no_homework",
        cursor: state.cursor
      });
      return {
        state,
        result: { outcome: "empty", current_date: checked.current_date }
      };
    }

    const parsed = parseStatus(checked.homework, { logger: deps.logger });
    if (parsed.status === state.last_status) {
      deps.logger.info({
        message: "watcher.no_change",
        homework_name: parsed.homework_name,
        status: parsed.status
      });
      return { state, result: { outcome: "unchanged", status: parsed.status } };
    }

    await notifyTelegram({ text: parsed.message }, { notifier: deps.notifier });
    const next: WatcherState = {
      last_status: parsed.status,
      cursor: checked.current_date
    };
    persistState(deps, next);
    return {
      state: next,
      result: { outcome: "notified", status: parsed.status, message: parsed.message }
    };
  } catch (error) {
    return { state, result: await reportFailure(deps, error) };
  }
}

export async function runWatcher(options: WatcherOptions): Promise<WatcherState> {
  const sleep = options.sleep ?? abortableSleep;
  let state = resolveInitialState(options.store, options.now);
  options.logger.info({
    message: "watcher.started",
    cursor: state.cursor,
    last_status: state.last_status,
    retry_period_ms: options.retryPeriodMs
  });

  while (!options.signal?.aborted) {
    const cycle = await runPollCycle(state, options);
    state = cycle.state;
    await sleep(options.retryPeriodMs, options.signal);
  }

  options.logger.info({ message: "watcher.stopped", cursor: state.cursor });
  return state;
}
