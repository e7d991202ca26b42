// Run history backed by a JSON file, so a restarted server keeps its runs

import { createMergeableStore, type MergeableStore } from "tinybase";
import { createFilePersister } from "tinybase/persisters/persister-file";
import { RunHistory } from "./run-history";

export interface PersistedHistory {
  store: MergeableStore;
  history: RunHistory;
  /** Write the store one last time and stop saving */
  close(): Promise<void>;
}

export async function openRunHistory(file: string): Promise<PersistedHistory> {
  const store = createMergeableStore();
  const persister = createFilePersister(store, file, (err) =>
    console.error(`[RunHistory] Ignored persister error for ${file}:`, err)
  );

  // A missing or unreadable file starts an empty history
  await persister.load();
  const history = new RunHistory(store);
  await persister.startAutoSave();
  console.log(`[RunHistory] Loaded ${history.list().length} runs from ${file}`);

  return {
    store,
    history,
    close: async () => {
      await persister.stopAutoSave();
      await persister.save();
      await persister.destroy();
    },
  };
}
