import { createMergeableStore } from "tinybase";

export type RunStatus = "running" | "completed" | "failed" | "stopped";
export type RunSource = "http" | "cli";

export const createAppStore = () =>
  createMergeableStore().setTablesSchema({
    // Action runs, written by the server and synced over /sync
    actionRuns: {
      action: { type: "string" },
      args: { type: "string", default: "[]" },
      source: { type: "string", default: "http" },
      status: { type: "string", default: "running" },
      code: { type: "number", default: 0 },
      startedAt: { type: "number" },
      finishedAt: { type: "number", default: 0 },
    },
  } as const);

export type AppStore = ReturnType<typeof createAppStore>;
