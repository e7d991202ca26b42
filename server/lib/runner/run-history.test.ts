import { createMergeableStore } from "tinybase";
import { describe, expect, it } from "vitest";
import { RUNS_TABLE, RunHistory } from "./run-history";

describe("RunHistory", () => {
  it("records a run from start to finish", () => {
    const history = new RunHistory(createMergeableStore());

    const id = history.start("set_dns_google", [], "cli", 1000);
    expect(history.get(id)).toEqual({
      id,
      action: "set_dns_google",
      args: [],
      source: "cli",
      status: "running",
      code: 0,
      startedAt: 1000,
      finishedAt: 0,
    });

    history.finish(id, 0, undefined, 5000);
    expect(history.get(id)).toMatchObject({ status: "completed", code: 0, finishedAt: 5000 });
  });

  it("derives failure from the exit code unless a status is given", () => {
    const history = new RunHistory(createMergeableStore());

    const failed = history.start("opkg_update", [], "http", 1);
    history.finish(failed, 4);
    const stopped = history.start("reboot_system", [], "http", 2);
    history.finish(stopped, 143, "stopped");

    expect(history.get(failed)?.status).toBe("failed");
    expect(history.get(stopped)?.status).toBe("stopped");
  });

  it("lists newest first with a limit", () => {
    const history = new RunHistory(createMergeableStore());
    history.start("a", [], "http", 1);
    history.start("b", [], "http", 3);
    history.start("c", [], "http", 2);

    expect(history.list().map((r) => r.action)).toEqual(["b", "c", "a"]);
    expect(history.list(1).map((r) => r.action)).toEqual(["b"]);
  });

  it("returns null for unknown runs", () => {
    expect(new RunHistory(createMergeableStore()).get("missing")).toBeNull();
  });

  it("marks runs left running by an earlier process as failed", () => {
    const store = createMergeableStore();
    store.setRow(RUNS_TABLE, "old", { action: "install_pw1", args: "[]", source: "http", status: "running", code: 0, startedAt: 1, finishedAt: 0 });

    const history = new RunHistory(store);

    expect(history.get("old")?.status).toBe("failed");
  });

  it("prunes finished runs older than the cutoff", () => {
    const history = new RunHistory(createMergeableStore());
    const old = history.start("a", [], "http", 0);
    history.finish(old, 0, undefined, 1000);
    const recent = history.start("b", [], "http", 0);
    history.finish(recent, 0, undefined, 9000);
    const running = history.start("c", [], "http", 0);

    expect(history.prune(5000, 10000)).toBe(1);
    expect(history.list().map((r) => r.id).sort()).toEqual([recent, running].sort());
  });
});
