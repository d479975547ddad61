import type { SqliteDatabase } from "./db.js";
import type { WatcherState } from "../../watcher/types.js";

type WatcherStateRow = {
  last_status: string | null;
  cursor: number;
};

export function loadWatcherState(db: SqliteDatabase): WatcherState | null {
  const row = db
    .prepare("SELECT last_status, cursor FROM watcher_state WHERE id = 1")
    .get() as WatcherStateRow | undefined;
  if (!row) {
    return null;
  }
  return { last_status: row.last_status, cursor: row.cursor };
}

export function saveWatcherState(
  db: SqliteDatabase,
  state: WatcherState,
  updatedAt: string = new Date().toISOString()
): void {
  db.prepare(
    `INSERT INTO watcher_state (id, last_status, cursor, updated_at)
     VALUES (1, @last_status, @cursor, @updated_at)
     ON CONFLICT(id) DO UPDATE SET
       last_status = excluded.last_status,
       cursor = excluded.cursor,
       updated_at = excluded.updated_at`
  ).run({
    last_status: state.last_status,
    cursor: state.cursor,
    updated_at: updatedAt
  });
}
