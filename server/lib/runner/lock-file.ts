// Single advisory lock for the action runner
// The file's existence is the lock; its JSON body only identifies the owner

import { randomUUID } from "node:crypto";
import { readFile, rm, stat, writeFile } from "node:fs/promises";
import { rmSync } from "node:fs";
import { z } from "zod";

export class LockHeldError extends Error {
  constructor(readonly lockPath: string) {
    super(`Lock ${lockPath} is held by another process`);
    this.name = "LockHeldError";
  }
}

const ownerSchema = z.object({
  pid: z.number().int(),
  action: z.string(),
  token: z.string(),
  startedAt: z.number(),
});

export type LockOwner = z.infer<typeof ownerSchema>;

function isErrnoException(err: unknown): err is NodeJS.ErrnoException {
  return err instanceof Error && "code" in err;
}

function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (err) {
    // EPERM means the process exists but belongs to someone else
    return isErrnoException(err) && err.code === "EPERM";
  }
}

// Kernel clock ticks per second for /proc/<pid>/stat start times
const CLOCK_TICKS = 100;
// /proc/stat btime has one second resolution
const START_TIME_SLACK_MS = 2000;

/**
 * When a process started, in epoch milliseconds, read from /proc.
 * Null where /proc is unavailable or the process is gone.
 */
export async function processStartedAt(pid: number): Promise<number | null> {
  try {
    const [stat, procStat] = await Promise.all([
      readFile(`/proc/${pid}/stat`, "utf8"),
      readFile("/proc/stat", "utf8"),
    ]);
    // Fields after the parenthesised command name start at field 3 (state); starttime is field 22
    const fields = stat.slice(stat.lastIndexOf(")") + 2).split(" ");
    const startTicks = Number(fields[19]);
    const bootSeconds = Number(/^btime (\d+)$/m.exec(procStat)?.[1]);
    if (!Number.isFinite(startTicks) || !Number.isFinite(bootSeconds)) return null;
    return bootSeconds * 1000 + (startTicks / CLOCK_TICKS) * 1000;
  } catch (err) {
    if (isErrnoException(err)) return null;
    throw err;
  }
}

export interface LockFileOptions {
  startedAt?: (pid: number) => Promise<number | null>;
}

export class LockFile {
  private readonly startedAt: (pid: number) => Promise<number | null>;

  constructor(
    readonly path: string,
    options: LockFileOptions = {}
  ) {
    this.startedAt = options.startedAt ?? processStartedAt;
  }

  /**
   * Create the lock atomically. Returns the token that release() needs.
   */
  async acquire(action: string, now = Date.now()): Promise<string> {
    const owner: LockOwner = {
      pid: process.pid,
      action,
      token: randomUUID(),
      startedAt: now,
    };

    try {
      await writeFile(this.path, JSON.stringify(owner), { flag: "wx" });
    } catch (err) {
      if (isErrnoException(err) && err.code === "EEXIST") {
        throw new LockHeldError(this.path);
      }
      throw err;
    }

    console.log(`[lock] Acquired ${this.path} for ${action}`);
    return owner.token;
  }

  /**
   * Remove the lock if it still belongs to the given token.
   * A lock taken over after a forced release is left alone.
   */
  async release(token: string): Promise<boolean> {
    const owner = await this.readOwner();
    if (owner && owner.token !== token) {
      console.log(`[lock] Not releasing ${this.path}: owned by ${owner.action}`);
      return false;
    }
    await rm(this.path, { force: true });
    return true;
  }

  /**
   * Synchronous removal for exit and signal handlers
   */
  releaseSync(): void {
    rmSync(this.path, { force: true });
  }

  async isHeld(): Promise<boolean> {
    try {
      await stat(this.path);
      return true;
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return false;
      throw err;
    }
  }

  /**
   * Owner details, or null when the lock is absent or was written by something else
   */
  async readOwner(): Promise<LockOwner | null> {
    let raw: string;
    try {
      raw = await readFile(this.path, "utf8");
    } catch (err) {
      if (isErrnoException(err) && err.code === "ENOENT") return null;
      throw err;
    }

    try {
      const parsed = ownerSchema.safeParse(JSON.parse(raw));
      return parsed.success ? parsed.data : null;
    } catch {
      return null;
    }
  }

  /**
   * Stop whoever holds the lock and remove it.
   * The owning process is signalled unless it is this one, or its pid now
   * belongs to a process that started after the lock was taken.
   */
  async forceRelease(): Promise<LockOwner | null> {
    const owner = await this.readOwner();

    if (owner && owner.pid !== process.pid && isProcessAlive(owner.pid)) {
      const started = await this.startedAt(owner.pid);
      if (started !== null && started > owner.startedAt + START_TIME_SLACK_MS) {
        console.log(`[lock] Not signalling pid ${owner.pid}: it started after the lock for ${owner.action}`);
      } else {
        console.log(`[lock] Sending SIGTERM to pid ${owner.pid} (${owner.action})`);
        process.kill(owner.pid, "SIGTERM");
      }
    }

    await rm(this.path, { force: true });
    return owner;
  }
}
