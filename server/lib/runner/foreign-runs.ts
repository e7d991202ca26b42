// Runs started outside the server (the `run` CLI command) only show up as a
// lock owned by another pid. Watching the lock puts them in the run history.

import { type ActionLog, lastLoggedResult } from "./action-log";
import type { LockFile } from "./lock-file";
import type { RunHistory } from "./run-history";

interface TrackedRun {
  token: string;
  runId: string;
  action: string;
}

export class ForeignRunTracker {
  private tracked: TrackedRun | null = null;

  constructor(
    private readonly lock: LockFile,
    private readonly log: ActionLog,
    private readonly history: RunHistory,
    private readonly pid = process.pid
  ) {}

  async check(now = Date.now()): Promise<void> {
    const owner = await this.lock.readOwner();

    if (this.tracked && owner?.token !== this.tracked.token) {
      const result = lastLoggedResult(await this.log.read());
      // No footer: the process died without finishing its log
      const code = result?.code ?? 1;
      this.history.finish(this.tracked.runId, code, result?.stopped ? "stopped" : undefined, now);
      console.log(`[runner] External run ${this.tracked.action} ended with code ${code}`);
      this.tracked = null;
    }

    if (owner && owner.pid !== this.pid && !this.tracked) {
      const runId = this.history.start(owner.action, [], "cli", owner.startedAt);
      this.tracked = { token: owner.token, runId, action: owner.action };
      console.log(`[runner] Recording external run ${owner.action} (pid ${owner.pid})`);
    }
  }
}
