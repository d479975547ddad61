import type { WatcherState } from "../watcher/types.js";

export type StateStore = {
  load: () => WatcherState | null;
  save: (state: WatcherState) => void;
  close: () => void;
};
