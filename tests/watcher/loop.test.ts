import { describe, expect, it, vi } from "vitest";
import {
  abortableSleep,
  formatFailureMessage,
  resolveInitialState,
  runPollCycle,
  runWatcher
} from "../../src/watcher/loop.js";
import type { WatcherDeps } from "../../src/watcher/loop.js";
import { createMemoryStateStore } from "../../src/storage/memory.js";
import { createPracticumClient } from "../../src/providers/practicum/index.js";
import { createTestLogger } from "../helpers.js";

const APPROVED_MESSAGE =
  "Изменился статус проверки работы \"hw1\". Работа проверена: ревьюеру всё понравилось. Ура!";
const REVIEWING_MESSAGE =
  "Изменился статус проверки работы \"hw1\". Работа взята на проверку ревьюером.";

function payload(status: string, currentDate = 1000) {
  return {
    homeworks: [{ id: 1, homework_name: "hw1", status }],
    current_date: currentDate
  };
}

function createDeps(responses: unknown[]) {
  const queue = [...responses];
  const client = {
    getHomeworkStatuses: vi.fn(async (_fromDate: number) => {
      const next = queue.length > 1 ? queue.shift() : queue[0];
      if (next instanceof Error) {
        throw next;
      }
      return next;
    })
  };
  const notifier = { sendMessage: vi.fn(async (_text: string) => undefined) };
  const store = createMemoryStateStore();
  const logger = createTestLogger();
  const deps: WatcherDeps = { client, notifier, store, logger };
  return { deps, client, notifier, store, logger };
}

describe("runPollCycle", () => {
  it("notifies on a new status and advances the cursor", async () => {
    const { deps, notifier, store } = createDeps([payload("approved", 1500)]);

    const cycle = await runPollCycle({ last_status: null, cursor: 500 }, deps);

    expect(notifier.sendMessage).toHaveBeenCalledWith(APPROVED_MESSAGE);
    expect(cycle.result).toEqual({
      outcome: "notified",
      status: "approved",
      message: APPROVED_MESSAGE
    });
    expect(cycle.state).toEqual({ last_status: "approved", cursor: 1500 });
    expect(store.load()).toEqual({ last_status: "approved", cursor: 1500 });
  });

  it("sends once for two cycles with the same status", async () => {
    const { deps, notifier, logger } = createDeps([payload("approved")]);

    const first = await runPollCycle({ last_status: null, cursor: 500 }, deps);
    const second = await runPollCycle(first.state, deps);

    expect(notifier.sendMessage).toHaveBeenCalledTimes(1);
    expect(second.result).toEqual({ outcome: "unchanged", status: "approved" });
    expect(second.state).toBe(first.state);
    expect(logger.info).toHaveBeenCalledWith({
      message: "watcher.no_change",
      homework_name: "hw1",
      status: "approved"
    });
  });

  it("notifies again when the status changes", async () => {
    const { deps, notifier } = createDeps([
      payload("reviewing", 1000),
      payload("approved", 2000)
    ]);

    const first = await runPollCycle({ last_status: null, cursor: 500 }, deps);
    const second = await runPollCycle(first.state, deps);

    expect(notifier.sendMessage.mock.calls).toEqual([
      [REVIEWING_MESSAGE],
      [APPROVED_MESSAGE]
    ]);
    expect(second.state).toEqual({ last_status: "approved", cursor: 2000 });
  });

  it("does not notify when there is no homework", async () => {
    const { deps, notifier } = createDeps([{ homeworks: [], current_date: 1000 }]);
    const state = { last_status: null, cursor: 500 };

    const cycle = await runPollCycle(state, deps);

    expect(notifier.sendMessage).not.toHaveBeenCalled();
    expect(cycle.result).toEqual({ outcome: "empty", current_date: 1000 });
    expect(cycle.state).toBe(state);
  });

  it("reports a malformed response to the chat", async () => {
    const { deps, notifier, logger } = createDeps([
      { homeworks: "not-a-list", current_date: 1000 }
    ]);
    const state = { last_status: null, cursor: 500 };
    const text =
      "Сбой в работе программы: API response field \"homeworks\" must be array, got string";

    const cycle = await runPollCycle(state, deps);

    expect(cycle.result).toEqual({ outcome: "failed", error: text, alert_sent: true });
    expect(cycle.state).toBe(state);
    expect(notifier.sendMessage).toHaveBeenCalledWith(text);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        message: "watcher.cycle.failed",
        error_kind: "TYPE_MISMATCH",
        error_code: "STEP_RESPONSE_CHECK_INVALID_TYPE"
      })
    );
  });

  it("swallows a failure to deliver the alert", async () => {
    const { deps, notifier, logger } = createDeps([new Error("connection refused")]);
    notifier.sendMessage.mockRejectedValue(new Error("telegram unavailable"));

    const cycle = await runPollCycle({ last_status: null, cursor: 500 }, deps);

    expect(cycle.result).toEqual({
      outcome: "failed",
      error: "Сбой в работе программы: connection refused",
      alert_sent: false
    });
    expect(logger.error).toHaveBeenCalledWith({
      message: "watcher.alert.failed",
      error: "telegram unavailable"
    });
  });

  it("alerts with the network cause of a failed request", async () => {
    const { deps, notifier, logger } = createDeps([]);
    const client = createPracticumClient({
      token: "t",
      endpoint: "http://127.0.0.1:1/statuses",
      logger,
      fetch: async () => {
        throw new TypeError("fetch failed", {
          cause: Object.assign(new Error("connect ECONNREFUSED 127.0.0.1:1"), {
            code: "ECONNREFUSED"
          })
        });
      }
    });

    const cycle = await runPollCycle(
      { last_status: null, cursor: 500 },
      { ...deps, client }
    );

    const text =
      "Сбой в работе программы: Practicum API connection failed: fetch failed (connect ECONNREFUSED 127.0.0.1:1)";
    expect(cycle.result).toEqual({ outcome: "failed", error: text, alert_sent: true });
    expect(notifier.sendMessage).toHaveBeenCalledWith(text);
    expect(logger.error).toHaveBeenCalledWith(
      expect.objectContaining({
        message: "watcher.cycle.failed",
        error_kind: "CONNECTION",
        cause: "connect ECONNREFUSED 127.0.0.1:1",
        details: {
          endpoint: "http://127.0.0.1:1/statuses",
          cause: "connect ECONNREFUSED 127.0.0.1:1"
        }
      })
    );
  });

  it("keeps the previous status when the notification fails", async () => {
    const { deps, notifier, store } = createDeps([payload("approved")]);
    notifier.sendMessage
      .mockRejectedValueOnce(new Error("telegram unavailable"))
      .mockResolvedValueOnce(undefined);
    const state = { last_status: "reviewing", cursor: 500 };

    const cycle = await runPollCycle(state, deps);

    expect(cycle.state).toBe(state);
    expect(store.load()).toBeNull();
    expect(notifier.sendMessage.mock.calls).toEqual([
      [APPROVED_MESSAGE],
      ["Сбой в работе программы: telegram unavailable"]
    ]);
  });

  it("still advances when saving the state fails", async () => {
    const { deps, logger } = createDeps([payload("rejected", 3000)]);
    const failingDeps: WatcherDeps = {
      ...deps,
      store: {
        load: () => null,
        save: () => {
          throw new Error("disk full");
        }
      }
    };

    const cycle = await runPollCycle({ last_status: null, cursor: 500 }, failingDeps);

    expect(cycle.state).toEqual({ last_status: "rejected", cursor: 3000 });
    expect(logger.error).toHaveBeenCalledWith({
      message: "watcher.state.save_failed",
      error: "disk full"
    });
  });
});

describe("runWatcher", () => {
  it("keeps polling after a no-change cycle until aborted", async () => {
    const { deps, client, notifier } = createDeps([payload("approved")]);
    const controller = new AbortController();
    let sleeps = 0;
    const sleep = vi.fn(async (_ms: number) => {
      sleeps += 1;
      if (sleeps === 3) {
        controller.abort();
      }
    });

    const state = await runWatcher({
      ...deps,
      retryPeriodMs: 600_000,
      signal: controller.signal,
      sleep,
      now: () => 500
    });

    expect(client.getHomeworkStatuses.mock.calls).toEqual([[500], [1000], [1000]]);
    expect(notifier.sendMessage).toHaveBeenCalledTimes(1);
    expect(sleep).toHaveBeenCalledTimes(3);
    expect(sleep).toHaveBeenCalledWith(600_000, controller.signal);
    expect(state).toEqual({ last_status: "approved", cursor: 1000 });
  });

  it("continues with the next cycle after a failure", async () => {
    const { deps, notifier } = createDeps([
      { homeworks: "not-a-list", current_date: 1000 },
      payload("reviewing")
    ]);
    const controller = new AbortController();
    let sleeps = 0;
    const sleep = vi.fn(async (_ms: number) => {
      sleeps += 1;
      if (sleeps === 2) {
        controller.abort();
      }
    });

    await runWatcher({
      ...deps,
      retryPeriodMs: 10,
      signal: controller.signal,
      sleep,
      now: () => 500
    });

    expect(notifier.sendMessage.mock.calls).toEqual([
      ["Сбой в работе программы: API response field \"homeworks\" must be array, got string"],
      [REVIEWING_MESSAGE]
    ]);
  });

  it("resumes from the stored state", async () => {
    const { deps, client, notifier } = createDeps([payload("approved")]);
    deps.store.save({ last_status: "approved", cursor: 900 });
    const controller = new AbortController();

    await runWatcher({
      ...deps,
      retryPeriodMs: 10,
      signal: controller.signal,
      sleep: async () => controller.abort()
    });

    expect(client.getHomeworkStatuses).toHaveBeenCalledWith(900);
    expect(notifier.sendMessage).not.toHaveBeenCalled();
  });

  it("does not poll when the signal is already aborted", async () => {
    const { deps, client } = createDeps([payload("approved")]);
    const controller = new AbortController();
    controller.abort();

    await runWatcher({ ...deps, retryPeriodMs: 10, signal: controller.signal });

    expect(client.getHomeworkStatuses).not.toHaveBeenCalled();
  });
});

describe("helpers", () => {
  it("formats failure messages", () => {
    expect(formatFailureMessage(new Error("boom"))).toBe("Сбой в работе программы: boom");
    expect(formatFailureMessage("plain")).toBe("Сбой в работе программы: plain");
  });

  it("starts from the current time without stored state", () => {
    expect(resolveInitialState(createMemoryStateStore(), () => 1234)).toEqual({
      last_status: null,
      cursor: 1234
    });
  });

  it("ends a sleep when the signal aborts", async () => {
    const controller = new AbortController();
    const sleeping = abortableSleep(60_000, controller.signal);
    controller.abort();
    await expect(sleeping).resolves.toBeUndefined();
  });
});
