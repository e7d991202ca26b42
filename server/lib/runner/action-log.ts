// Append-only action log
// Everything an action prints ends up here; the dashboard polls the whole file

import { appendFile, readFile, writeFile } from "node:fs/promises";

export const LOG_RULE = "--------------------------------------";
export const LOCK_CONTENTION_LINE =
  ">>> Another process is already running. Please wait for it to finish.";

export function formatLogDate(date: Date): string {
  return date.toISOString();
}

export interface LoggedResult {
  code: number;
  stopped: boolean;
}

const SUCCESS_LINE = /^Action completed successfully at /;
const FAILURE_LINE = /^Action failed with exit code (\d+) at /;
const STOP_LINE = /^>>> Process stopped by user at /;

/**
 * Result of the most recent run recorded in the log text, read back from its
 * footer or stop line. Null when the last run left neither.
 */
export function lastLoggedResult(text: string): LoggedResult | null {
  const lines = text.split("\n");
  for (let i = lines.length - 1; i >= 0; i--) {
    const line = lines[i];
    if (line.startsWith(">>> Starting action: ")) return null;
    if (SUCCESS_LINE.test(line)) return { code: 0, stopped: false };
    const failed = FAILURE_LINE.exec(line);
    if (failed) return { code: Number(failed[1]), stopped: false };
    if (STOP_LINE.test(line)) return { code: 143, stopped: true };
  }
  return null;
}

export class ActionLog {
  // Writes are chained so lines land in the order they were produced
  private queue: Promise<void> = Promise.resolve();

  constructor(readonly path: string) {}

  /**
   * Queue text for appending without waiting for it
   */
  write(text: string): void {
    this.queue = this.queue
      .then(() => appendFile(this.path, text))
      .catch((err) => {
        console.error(
          `[action-log] Failed to write ${this.path}:`,
          err instanceof Error ? err.message : err
        );
      });
  }

  async flush(): Promise<void> {
    await this.queue;
  }

  async append(line: string): Promise<void> {
    this.write(`${line}\n`);
    await this.flush();
  }

  async read(): Promise<string> {
    await this.flush();
    try {
      return await readFile(this.path, "utf8");
    } catch (err) {
      if (err instanceof Error && "code" in err && err.code === "ENOENT") return "";
      throw err;
    }
  }

  async clear(now = new Date()): Promise<void> {
    await this.flush();
    await writeFile(this.path, `Log cleared by user at ${formatLogDate(now)}\n`);
  }

  async banner(action: string, now = new Date()): Promise<void> {
    this.write(`>>> Starting action: ${action} at ${formatLogDate(now)}\n`);
    this.write(`${LOG_RULE}\n`);
    await this.flush();
  }

  async footer(code: number, now = new Date()): Promise<void> {
    const result =
      code === 0
        ? `Action completed successfully at ${formatLogDate(now)}.`
        : `Action failed with exit code ${code} at ${formatLogDate(now)}.`;
    this.write(`${LOG_RULE}\n`);
    this.write(`${result}\n`);
    this.write(">>> SCRIPT FINISHED <<<\n");
    await this.flush();
  }

  async contention(): Promise<void> {
    await this.append(LOCK_CONTENTION_LINE);
  }

  async stopped(now = new Date()): Promise<void> {
    this.write(`\n>>> Process stopped by user at ${formatLogDate(now)} <<<\n`);
    await this.flush();
  }
}
