import { Elysia, t } from "elysia";
import { cors } from "@elysiajs/cors";
import type { Executor } from "./lib/exec";
import { getTerminalInfo } from "./lib/openwrt/ttyd";
import { ActionInputError } from "./lib/runner/action-context";
import {
  ACTION_NAME_PATTERN,
  type ActionRunner,
  CLEAR_LOG_ACTION,
} from "./lib/runner/action-runner";
import { argsFromParams } from "./lib/runner/actions";
import { LockHeldError } from "./lib/runner/lock-file";
import type { RunHistory } from "./lib/runner/run-history";

export const STOP_ACTION = "stop_process";

export interface ApiDeps {
  runner: ActionRunner;
  exec: Executor;
  history?: RunHistory;
}

function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : "Unknown error";
}

export function createApi({ runner, exec, history }: ApiDeps) {
  return new Elysia()
    .use(cors())

    // ============================================
    // Runner status and control
    // ============================================

    .get("/api/status", async () => {
      const [running, log] = await Promise.all([runner.isRunning(), runner.log.read()]);
      return { running, log };
    })

    .post(
      "/api/run",
      async ({ body }) => {
        const { action, ...params } = body;

        if (!ACTION_NAME_PATTERN.test(action)) {
          return { success: false, error: "Invalid action" };
        }

        try {
          if (action === STOP_ACTION) {
            await runner.stop();
            return { success: true };
          }

          if (action === CLEAR_LOG_ACTION) {
            await runner.clearLog();
            return { success: true };
          }

          const args = argsFromParams(runner.registry.get(action), params);
          const started = await runner.start(action, args);
          started.done.catch((err) => {
            console.error(`[api] ${action} did not finish cleanly:`, errorMessage(err));
          });

          return { success: true };
        } catch (err) {
          if (err instanceof LockHeldError) {
            return { success: false, error: "Another action is already running" };
          }
          if (err instanceof ActionInputError) {
            return { success: false, error: err.message };
          }
          console.error(`[api] Failed to start ${action}:`, errorMessage(err));
          return { success: false, error: errorMessage(err) };
        }
      },
      {
        body: t.Object({
          action: t.String(),
          dns1: t.Optional(t.String()),
          dns2: t.Optional(t.String()),
          packages: t.Optional(t.String()),
          ssid: t.Optional(t.String()),
          key: t.Optional(t.String()),
          band: t.Optional(t.String()),
          ipaddr: t.Optional(t.String()),
        }),
      }
    )

    // ============================================
    // Web terminal
    // ============================================

    .get("/api/terminal", async () => {
      try {
        return await getTerminalInfo(exec);
      } catch (err) {
        return { error: errorMessage(err) };
      }
    })

    // ============================================
    // Catalogs and history
    // ============================================

    .get("/api/actions", () => {
      const actions = [...runner.registry.values()].map((def) => ({
        name: def.name,
        title: def.title,
        category: def.category,
        confirm: def.confirm ?? null,
        params: def.params,
      }));
      return { actions };
    })

    .get("/api/services", async () => {
      try {
        return { services: await runner.services.read() };
      } catch (err) {
        return { services: [], error: errorMessage(err) };
      }
    })

    .get(
      "/api/runs",
      ({ query }) => {
        const limit = query.limit ? parseInt(query.limit, 10) : 50;
        return { runs: history?.list(Number.isNaN(limit) ? 50 : Math.max(limit, 0)) ?? [] };
      },
      {
        query: t.Object({ limit: t.Optional(t.String()) }),
      }
    );
}

export type Api = ReturnType<typeof createApi>;
