import { createServer, type IncomingMessage, type Server } from "node:http";
import { createWsServer } from "tinybase/synchronizers/synchronizer-ws-server";
import { createWsSynchronizer } from "tinybase/synchronizers/synchronizer-ws-client";
import { WebSocketServer, WebSocket } from "ws";
import { createApi } from "./api";
import type { AppConfig } from "./lib/config";
import { shellExecutor } from "./lib/exec";
import { ActionRunner } from "./lib/runner/action-runner";
import { ForeignRunTracker } from "./lib/runner/foreign-runs";
import { openRunHistory } from "./lib/runner/history-store";

const SYNC_PATH = "/sync";
const PRUNE_INTERVAL_MS = 60 * 60 * 1000;
const LOCK_WATCH_INTERVAL_MS = 2000;

export interface ConsoleServer {
  server: Server;
  runner: ActionRunner;
  /** Stop the in-process run, release its lock, save history and close every connection */
  shutdown(): Promise<void>;
}

// Convert Node request to Web Request
export function toWebRequest(req: IncomingMessage, body: string): Request {
  const url = new URL(req.url || "/", `http://${req.headers.host ?? "localhost"}`);
  const headers = new Headers();
  for (const [name, value] of Object.entries(req.headers)) {
    if (value === undefined) continue;
    for (const v of Array.isArray(value) ? value : [value]) {
      headers.append(name, v);
    }
  }
  return new Request(url, {
    method: req.method,
    headers,
    body: req.method !== "GET" && req.method !== "HEAD" ? body : undefined,
  });
}

export async function startServer(config: AppConfig): Promise<ConsoleServer> {
  // TinyBase WebSocket sync
  const wss = new WebSocketServer({ noServer: true });
  const wsServer = createWsServer(wss);

  // Server-side MergeableStore that participates in sync, saved to disk
  const { store, history, close: closeHistory } = await openRunHistory(config.historyFile);
  const runner = new ActionRunner({ config, history, source: "http" });
  const api = createApi({ runner, exec: shellExecutor, history });
  const foreignRuns = new ForeignRunTracker(runner.lock, runner.log, history);
  let serverSynchronizer: Awaited<ReturnType<typeof createWsSynchronizer>> | null = null;

  wsServer.addClientIdsListener(null, () => {
    const stats = wsServer.getStats();
    console.log(`[sync] paths: ${stats.paths ?? 0}, clients: ${stats.clients ?? 0}`);
  });

  async function connectServerStore() {
    const ws = new WebSocket(`ws://localhost:${config.port}${SYNC_PATH}`);

    ws.on("open", () => console.log("[sync] WebSocket connected to", SYNC_PATH));
    ws.on("close", () => console.log("[sync] WebSocket closed"));
    ws.on("error", (err) => console.log("[sync] WebSocket error:", err.message));

    const synchronizer = await createWsSynchronizer(store, ws, 1);
    serverSynchronizer = synchronizer;
    await synchronizer.startSync();
    console.log("[sync] Server store connected to sync on path:", SYNC_PATH);
  }

  // HTTP server with WebSocket upgrade support
  const server = createServer((req, res) => {
    let body = "";
    req.on("data", (chunk) => (body += chunk));
    req.on("end", async () => {
      try {
        const webRequest = toWebRequest(req, body);
        const response = await api.handle(webRequest);

        res.writeHead(response.status, Object.fromEntries(response.headers));
        res.end(await response.text());
      } catch (err) {
        res.writeHead(500, { "Content-Type": "application/json" });
        res.end(JSON.stringify({ error: err instanceof Error ? err.message : "Unknown error" }));
      }
    });
  });

  server.on("upgrade", (req, socket, head) => {
    wss.handleUpgrade(req, socket, head, (ws) => {
      wss.emit("connection", ws, req);
    });
  });

  const pruneTimer = setInterval(() => history.prune(), PRUNE_INTERVAL_MS);
  pruneTimer.unref();
  const lockWatch = setInterval(() => {
    foreignRuns.check().catch((err: unknown) =>
      console.error("[runner] Lock watch failed:", err instanceof Error ? err.message : err)
    );
  }, LOCK_WATCH_INTERVAL_MS);
  lockWatch.unref();

  await new Promise<void>((resolve) => server.listen(config.port, config.host, resolve));

  console.log(`Router Console Server running on http://${config.host}:${config.port}`);
  console.log(`  WebSocket (TinyBase sync): ws://localhost:${config.port}${SYNC_PATH}`);
  console.log(`  HTTP API: http://localhost:${config.port}/api/*`);

  // Connect server store to sync mesh
  connectServerStore().catch(console.error);

  async function shutdown(): Promise<void> {
    clearInterval(pruneTimer);
    clearInterval(lockWatch);
    await runner.shutdown();
    serverSynchronizer?.destroy();
    for (const client of wss.clients) client.terminate();
    wsServer.destroy();
    await closeHistory();
    await new Promise<void>((resolve, reject) => {
      server.close((err) => (err ? reject(err) : resolve()));
      server.closeAllConnections();
    });
    console.log("[server] Stopped");
  }

  return { server, runner, shutdown };
}
