import type { SqliteDatabase } from "./db.js";
import { openSqliteDatabase } from "./db.js";
import { loadWatcherState, saveWatcherState } from "./state.repo.js";
import type { StateStore } from "../types.js";

export type SqliteStateStoreOptions = {
  db?: SqliteDatabase;
  filename?: string;
};

export function createSqliteStateStore(
  options: SqliteStateStoreOptions = {}
): StateStore {
  const db =
    options.db ??
    openSqliteDatabase({ filename: options.filename ?? ":memory:" });

  return {
    load: () => loadWatcherState(db),
    save: (state) => saveWatcherState(db, state),
    close: () => db.close()
  };
}
