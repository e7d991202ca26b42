// What an action handler gets to work with, plus the shell helpers they share

import { chmod, writeFile } from "node:fs/promises";
import { join } from "node:path";
import type { AppConfig } from "../config";
import type { ExecResult, Executor } from "../exec";
import type { ServiceCatalog } from "../services/service-catalog";
import type { ActionLog } from "./action-log";

export interface ActionContext {
  config: AppConfig;
  exec: Executor;
  log: ActionLog;
  services: ServiceCatalog;
  fetch: typeof fetch;
  signal: AbortSignal;
}

/**
 * Raised by handlers for arguments they cannot act on
 */
export class ActionInputError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ActionInputError";
  }
}

/**
 * Run a command with its output streamed into the action log
 */
export async function runLogged(
  ctx: ActionContext,
  command: string,
  cwd = ctx.config.workDir
): Promise<number> {
  const result = await ctx.exec.run(command, {
    cwd,
    timeout: ctx.config.commandTimeout,
    signal: ctx.signal,
    onLine: (line) => ctx.log.write(`${line}\n`),
  });
  await ctx.log.flush();
  return result.code;
}

/**
 * Run commands in order, stopping at the first failure
 */
export async function runSequence(
  ctx: ActionContext,
  commands: readonly string[]
): Promise<number> {
  for (const command of commands) {
    const code = await runLogged(ctx, command);
    if (code !== 0) {
      await ctx.log.append(`ERROR: '${command}' exited with code ${code}.`);
      return code;
    }
  }
  return 0;
}

/**
 * Run a command and hand back its output instead of logging it
 */
export async function capture(ctx: ActionContext, command: string): Promise<ExecResult> {
  return ctx.exec.run(command, {
    cwd: ctx.config.workDir,
    timeout: ctx.config.commandTimeout,
    signal: ctx.signal,
  });
}

/**
 * Download a script into the work directory, replacing any earlier copy.
 * Returns the path of the executable file.
 */
export async function downloadScript(
  ctx: ActionContext,
  url: string,
  fileName: string
): Promise<string> {
  const res = await ctx.fetch(url, { signal: ctx.signal });
  if (!res.ok) {
    throw new Error(`Download of ${url} failed: ${res.status} ${res.statusText}`);
  }

  const path = join(ctx.config.workDir, fileName);
  await writeFile(path, await res.text());
  await chmod(path, 0o755);
  return path;
}

export function sleep(ms: number, signal: AbortSignal): Promise<void> {
  return new Promise((resolve, reject) => {
    if (signal.aborted) {
      reject(new Error("Aborted"));
      return;
    }
    const onAbort = () => {
      clearTimeout(timer);
      reject(new Error("Aborted"));
    };
    const timer = setTimeout(() => {
      signal.removeEventListener("abort", onAbort);
      resolve();
    }, ms);
    signal.addEventListener("abort", onAbort, { once: true });
  });
}
