// Serialized action runner
// One action at a time per router, guarded by the lock file and reported through the action log

import type { AppConfig } from "../config";
import { type Executor, shellExecutor } from "../exec";
import { ServiceCatalog } from "../services/service-catalog";
import { type ActionContext, ActionInputError } from "./action-context";
import { ActionLog } from "./action-log";
import { type ActionRegistry, createActionRegistry } from "./actions";
import { delegateAction } from "./delegate";
import { LockFile, LockHeldError } from "./lock-file";
import type { RunHistory, RunSource } from "./run-history";

export const CLEAR_LOG_ACTION = "clear_log";
export const ACTION_NAME_PATTERN = /^[a-zA-Z0-9_.-]+$/;

export interface RunOutcome {
  action: string;
  code: number;
  stopped: boolean;
}

export interface StartedRun {
  action: string;
  /** Settles once the action has finished and the lock is released */
  done: Promise<RunOutcome>;
}

export interface ActionRunnerOptions {
  config: AppConfig;
  exec?: Executor;
  fetch?: typeof fetch;
  registry?: ActionRegistry;
  history?: RunHistory;
  services?: ServiceCatalog;
  source?: RunSource;
  now?: () => Date;
}

export class ActionRunner {
  readonly log: ActionLog;
  readonly lock: LockFile;
  readonly registry: ActionRegistry;
  readonly services: ServiceCatalog;

  private readonly config: AppConfig;
  private readonly exec: Executor;
  private readonly fetchImpl: typeof fetch;
  private readonly history?: RunHistory;
  private readonly source: RunSource;
  private readonly now: () => Date;

  private current: AbortController | null = null;
  private inFlight: Promise<RunOutcome> | null = null;

  constructor(options: ActionRunnerOptions) {
    this.config = options.config;
    this.exec = options.exec ?? shellExecutor;
    this.fetchImpl = options.fetch ?? fetch;
    this.registry = options.registry ?? createActionRegistry();
    this.history = options.history;
    this.source = options.source ?? "http";
    this.now = options.now ?? (() => new Date());
    this.log = new ActionLog(options.config.logFile);
    this.lock = new LockFile(options.config.lockFile);
    this.services =
      options.services ??
      new ServiceCatalog(options.config.servicesJsonUrl, options.config.servicesFile, this.fetchImpl);
  }

  isKnownAction(action: string): boolean {
    return this.registry.has(action);
  }

  /**
   * Take the lock and start the action in the background.
   * Throws LockHeldError (after logging the contention line) when another run holds the lock.
   */
  async start(action: string, args: readonly string[] = []): Promise<StartedRun> {
    if (!ACTION_NAME_PATTERN.test(action)) {
      throw new ActionInputError(`Invalid action name '${action}'`);
    }

    let token: string;
    try {
      token = await this.lock.acquire(action, this.now().getTime());
    } catch (err) {
      if (err instanceof LockHeldError) {
        await this.log.contention();
        console.log(`[runner] Refused ${action}: lock held`);
      }
      throw err;
    }

    const controller = new AbortController();
    this.current = controller;
    const runId = this.history?.start(action, args, this.source, this.now().getTime());

    const done = this.execute(action, args, controller).then(async (outcome) => {
      if (this.current === controller) this.current = null;
      await this.lock.release(token);
      if (this.inFlight === done) this.inFlight = null;
      if (runId) {
        this.history?.finish(runId, outcome.code, outcome.stopped ? "stopped" : undefined);
      }
      console.log(`[runner] ${action} finished with code ${outcome.code}`);
      return outcome;
    });
    this.inFlight = done;

    return { action, done };
  }

  /**
   * Run an action to completion
   */
  async run(action: string, args: readonly string[] = []): Promise<RunOutcome> {
    if (action === CLEAR_LOG_ACTION) {
      await this.clearLog();
      return { action, code: 0, stopped: false };
    }
    const started = await this.start(action, args);
    return started.done;
  }

  async clearLog(): Promise<void> {
    await this.log.clear(this.now());
    console.log("[runner] Log cleared");
  }

  /**
   * Stop the running action, whether it runs in this process or another one
   */
  async stop(): Promise<void> {
    this.current?.abort();
    this.current = null;
    const owner = await this.lock.forceRelease();
    await this.log.stopped(this.now());
    console.log(`[runner] Stopped${owner ? ` ${owner.action} (pid ${owner.pid})` : ""}`);
  }

  /**
   * Abort the action running in this process without touching the log.
   * Its run settles as stopped and releases the lock.
   */
  abort(): boolean {
    if (!this.current) return false;
    this.current.abort();
    this.current = null;
    return true;
  }

  /**
   * Abort the in-process run, wait for it to settle and make sure its lock
   * is gone. A lock held by another process is left alone.
   */
  async shutdown(): Promise<void> {
    const pending = this.inFlight;
    this.abort();
    if (pending) {
      try {
        await pending;
      } catch (err) {
        console.error("[runner] Run failed while shutting down:", err instanceof Error ? err.message : err);
      }
    }

    const owner = await this.lock.readOwner();
    if (owner && owner.pid === process.pid) {
      await this.lock.release(owner.token);
      console.log(`[runner] Released lock left by ${owner.action}`);
    }
  }

  async isRunning(): Promise<boolean> {
    return this.lock.isHeld();
  }

  private async execute(
    action: string,
    args: readonly string[],
    controller: AbortController
  ): Promise<RunOutcome> {
    const ctx: ActionContext = {
      config: this.config,
      exec: this.exec,
      log: this.log,
      services: this.services,
      fetch: this.fetchImpl,
      signal: controller.signal,
    };

    let code: number;
    try {
      await this.log.banner(action, this.now());
      const definition = this.registry.get(action);
      code = definition ? await definition.run(ctx, args) : await delegateAction(ctx, action);
    } catch (err) {
      if (controller.signal.aborted) {
        return { action, code: 143, stopped: true };
      }
      const message = err instanceof Error ? err.message : "Unknown error";
      console.error(`[runner] ${action} failed:`, message);
      await this.log.append(`ERROR: ${message}`);
      code = 1;
    }

    if (controller.signal.aborted) {
      return { action, code: 143, stopped: true };
    }

    await this.log.footer(code, this.now());
    return { action, code, stopped: false };
  }
}
