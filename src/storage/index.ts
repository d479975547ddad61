import { createMemoryStateStore } from "./memory.js";
import type { StateStore } from "./types.js";
import type { SqliteStateStoreOptions } from "./sqlite/index.js";

export type StateStoreOptions = {
  state_db_path?: string;
};

async function createSqliteStateStore(
  options: SqliteStateStoreOptions
): Promise<StateStore> {
  const sqlite = await import("./sqlite/index.js");
  return sqlite.createSqliteStateStore(options);
}

/**
 * Picks the SQLite store when a database path is configured; the native
 * driver is only loaded in that case.
 */
export async function createStateStore(
  options: StateStoreOptions = {}
): Promise<StateStore> {
  if (options.state_db_path) {
    return createSqliteStateStore({ filename: options.state_db_path });
  }
  return createMemoryStateStore();
}

export { createMemoryStateStore, createSqliteStateStore };
export type { StateStore, SqliteStateStoreOptions };
