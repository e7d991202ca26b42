/**
 * Action run history kept in the server's TinyBase store.
 * The table syncs to dashboards over the /sync WebSocket.
 */

import { randomUUID } from "node:crypto";
import type { MergeableStore, Row } from "tinybase";

export const RUNS_TABLE = "actionRuns";

export type RunStatus = "running" | "completed" | "failed" | "stopped";
export type RunSource = "http" | "cli";

export interface RunRecord {
  id: string;
  action: string;
  args: string[];
  source: RunSource;
  status: RunStatus;
  code: number;
  startedAt: number;
  finishedAt: number;
}

function isRunStatus(value: unknown): value is RunStatus {
  return value === "running" || value === "completed" || value === "failed" || value === "stopped";
}

function parseArgs(value: unknown): string[] {
  if (typeof value !== "string") return [];
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((a): a is string => typeof a === "string") : [];
  } catch {
    return [];
  }
}

function toRunRecord(id: string, row: Row): RunRecord | null {
  const { action, source, status, code, startedAt, finishedAt } = row;
  if (typeof action !== "string" || !isRunStatus(status)) return null;

  return {
    id,
    action,
    args: parseArgs(row.args),
    source: source === "cli" ? "cli" : "http",
    status,
    code: typeof code === "number" ? code : 0,
    startedAt: typeof startedAt === "number" ? startedAt : 0,
    finishedAt: typeof finishedAt === "number" ? finishedAt : 0,
  };
}

export class RunHistory {
  constructor(private readonly store: MergeableStore) {
    this.markInterrupted();
  }

  /**
   * Runs left "running" by a previous server process cannot be finished any more
   */
  private markInterrupted(): void {
    for (const record of this.list()) {
      if (record.status === "running") {
        this.store.setPartialRow(RUNS_TABLE, record.id, {
          status: "failed",
          finishedAt: Date.now(),
        });
        console.log(`[RunHistory] Marked interrupted run ${record.id} (${record.action}) as failed`);
      }
    }
  }

  start(action: string, args: readonly string[], source: RunSource, now = Date.now()): string {
    const id = randomUUID();
    this.store.setRow(RUNS_TABLE, id, {
      action,
      args: JSON.stringify(args),
      source,
      status: "running",
      code: 0,
      startedAt: now,
      finishedAt: 0,
    });
    return id;
  }

  finish(id: string, code: number, status?: RunStatus, now = Date.now()): void {
    this.store.setPartialRow(RUNS_TABLE, id, {
      status: status ?? (code === 0 ? "completed" : "failed"),
      code,
      finishedAt: now,
    });
  }

  get(id: string): RunRecord | null {
    if (!this.store.hasRow(RUNS_TABLE, id)) return null;
    return toRunRecord(id, this.store.getRow(RUNS_TABLE, id));
  }

  /**
   * Newest first
   */
  list(limit?: number): RunRecord[] {
    const records: RunRecord[] = [];
    for (const id of this.store.getRowIds(RUNS_TABLE)) {
      const record = toRunRecord(id, this.store.getRow(RUNS_TABLE, id));
      if (record) records.push(record);
    }
    records.sort((a, b) => b.startedAt - a.startedAt);
    return limit === undefined ? records : records.slice(0, limit);
  }

  /**
   * Drop finished runs older than maxAgeMs. Returns how many were removed.
   */
  prune(maxAgeMs: number = 24 * 60 * 60 * 1000, now = Date.now()): number {
    const cutoff = now - maxAgeMs;
    let removed = 0;

    for (const record of this.list()) {
      if (record.status !== "running" && record.finishedAt < cutoff) {
        this.store.delRow(RUNS_TABLE, record.id);
        removed++;
      }
    }

    if (removed > 0) {
      console.log(`[RunHistory] Pruned ${removed} old runs`);
    }
    return removed;
  }
}
