import type { WatcherState } from "../watcher/types.js";
import type { StateStore } from "./types.js";

/** Keeps the watcher state for the lifetime of the process only. */
export function createMemoryStateStore(initial: WatcherState | null = null): StateStore {
  let current = initial ? { ...initial } : null;
  return {
    load: () => (current ? { ...current } : null),
    save: (state) => {
      current = { ...state };
    },
    close: () => undefined
  };
}
