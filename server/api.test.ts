import { createMergeableStore } from "tinybase";
import { beforeEach, describe, expect, it, vi } from "vitest";
import { createApi } from "./api";
import type { AppConfig } from "./lib/config";
import { ActionRunner } from "./lib/runner/action-runner";
import { type ActionDefinition, createActionRegistry } from "./lib/runner/actions";
import { LockFile } from "./lib/runner/lock-file";
import { RunHistory } from "./lib/runner/run-history";
import { FakeExecutor, fakeFetch, tempConfig } from "./testing/fakes";

const echoArgs: ActionDefinition = {
  name: "set_dns_custom",
  title: "Custom DNS",
  category: "dns",
  params: ["dns1", "dns2"],
  run: async (ctx, args) => {
    await ctx.log.append(`args: ${args.join(",")}`);
    return 0;
  },
};

function post(path: string, body: unknown): Request {
  return new Request(`http://localhost${path}`, {
    method: "POST",
    headers: { "Content-Type": "application/json" },
    body: JSON.stringify(body),
  });
}

function get(path: string): Request {
  return new Request(`http://localhost${path}`);
}

describe("HTTP API", () => {
  let config: AppConfig;
  let runner: ActionRunner;
  let history: RunHistory;
  let exec: FakeExecutor;
  let api: ReturnType<typeof createApi>;

  beforeEach(async () => {
    config = await tempConfig();
    history = new RunHistory(createMergeableStore());
    exec = new FakeExecutor((cmd) =>
      cmd === "uci show ttyd"
        ? { stdout: "ttyd.core=ttyd\nttyd.core.port='7682'\nttyd.core.ssl='1'\n" }
        : {}
    );
    runner = new ActionRunner({
      config,
      exec,
      history,
      registry: createActionRegistry([echoArgs]),
      fetch: fakeFetch({}).fetch,
    });
    api = createApi({ runner, exec, history });
  });

  it("reports an idle runner with an empty log", async () => {
    const res = await api.handle(get("/api/status"));
    expect(await res.json()).toEqual({ running: false, log: "" });
  });

  it("reports a held lock as running", async () => {
    await new LockFile(config.lockFile).acquire("install_pw1");
    await runner.log.append("Downloading...");

    const res = await api.handle(get("/api/status"));
    expect(await res.json()).toEqual({ running: true, log: "Downloading...\n" });
  });

  it("starts an action with its named inputs in order", async () => {
    const res = await api.handle(post("/api/run", { action: "set_dns_custom", dns2: "8.8.4.4", dns1: "8.8.8.8" }));
    expect(await res.json()).toEqual({ success: true });

    await vi.waitFor(async () => {
      expect(await runner.log.read()).toContain(">>> SCRIPT FINISHED <<<");
    });
    expect(await runner.log.read()).toContain("args: 8.8.8.8,8.8.4.4\n");
  });

  it("rejects malformed action names", async () => {
    const res = await api.handle(post("/api/run", { action: "../etc/passwd" }));
    expect(await res.json()).toEqual({ success: false, error: "Invalid action" });
  });

  it("refuses to start while another action runs", async () => {
    await new LockFile(config.lockFile).acquire("install_pw1");

    const res = await api.handle(post("/api/run", { action: "set_dns_custom" }));

    expect(await res.json()).toEqual({ success: false, error: "Another action is already running" });
  });

  it("clears the log", async () => {
    await runner.log.append("old output");

    const res = await api.handle(post("/api/run", { action: "clear_log" }));

    expect(await res.json()).toEqual({ success: true });
    expect(await runner.log.read()).toMatch(/^Log cleared by user at \S+\n$/);
  });

  it("stops the running action", async () => {
    await new LockFile(config.lockFile).acquire("install_pw1");

    const res = await api.handle(post("/api/run", { action: "stop_process" }));

    expect(await res.json()).toEqual({ success: true });
    expect(await runner.isRunning()).toBe(false);
    expect(await runner.log.read()).toMatch(/^\n>>> Process stopped by user at \S+ <<<\n$/);
  });

  it("returns the web terminal port", async () => {
    const res = await api.handle(get("/api/terminal"));
    expect(await res.json()).toEqual({ port: "7682", ssl: true });
  });

  it("lists the available actions", async () => {
    const res = await api.handle(get("/api/actions"));
    expect(await res.json()).toEqual({
      actions: [
        { name: "set_dns_custom", title: "Custom DNS", category: "dns", confirm: null, params: ["dns1", "dns2"] },
      ],
    });
  });

  it("returns an empty service list before one was downloaded", async () => {
    const res = await api.handle(get("/api/services"));
    expect(await res.json()).toEqual({ services: [] });
  });

  it("treats a negative run limit as zero", async () => {
    history.start("a", [], "http", 1);
    history.start("b", [], "http", 2);

    const res = await api.handle(get("/api/runs?limit=-1"));
    expect(await res.json()).toEqual({ runs: [] });
  });

  it("lists recorded runs", async () => {
    const id = history.start("set_dns_custom", ["1.1.1.1", ""], "cli", 10);
    history.finish(id, 0, undefined, 20);

    const res = await api.handle(get("/api/runs?limit=5"));
    expect(await res.json()).toEqual({
      runs: [
        {
          id,
          action: "set_dns_custom",
          args: ["1.1.1.1", ""],
          source: "cli",
          status: "completed",
          code: 0,
          startedAt: 10,
          finishedAt: 20,
        },
      ],
    });
  });
});
