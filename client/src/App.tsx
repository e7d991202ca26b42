import { StrictMode, useEffect, useState } from "react";
import ReconnectingWebSocket from "reconnecting-websocket";
import { History, LayoutDashboard, Package, SquareTerminal } from "lucide-react";
import type { MergeableStore } from "tinybase";
import { createWsSynchronizer } from "tinybase/synchronizers/synchronizer-ws-client";
import { Provider, useCreateMergeableStore, useCreateSynchronizer } from "tinybase/ui-react";
import { createAppStore } from "@/store";
import { useRunnerStatus } from "@/hooks/useRunnerStatus";
import { ActionPicker } from "@/components/runner/ActionPicker";
import { LogPanel } from "@/components/runner/LogPanel";
import { RunHistoryTable } from "@/components/runner/RunHistoryTable";
import { ServicesList } from "@/components/runner/ServicesList";
import { TerminalPanel } from "@/components/runner/TerminalPanel";

const SYNC_PATH = "/sync";

const navItems = [
  { title: "Actions", url: "#actions", icon: LayoutDashboard },
  { title: "Services", url: "#services", icon: Package },
  { title: "History", url: "#history", icon: History },
  { title: "Terminal", url: "#terminal", icon: SquareTerminal },
];

function SyncStatus({ status }: { status: string }) {
  const colors: Record<string, string> = {
    connected: "bg-emerald-500",
    connecting: "bg-amber-500",
    disconnected: "bg-red-500",
  };
  return (
    <div className="flex items-center gap-2 text-sm text-zinc-400">
      <div className={`h-2 w-2 rounded-full ${colors[status] ?? colors.disconnected}`} />
      {status === "connected" ? "Synced" : status}
    </div>
  );
}

function useHash() {
  const [hash, setHash] = useState(window.location.hash);
  useEffect(() => {
    const onHashChange = () => setHash(window.location.hash);
    window.addEventListener("hashchange", onHashChange);
    return () => window.removeEventListener("hashchange", onHashChange);
  }, []);
  return hash;
}

function MainView({ syncStatus }: { syncStatus: string }) {
  const hash = useHash();
  const [autoRefresh, setAutoRefresh] = useState(true);
  const status = useRunnerStatus(autoRefresh);
  const refresh = () => void status.refresh();

  const renderContent = () => {
    if (hash === "#terminal") return <TerminalPanel />;
    if (hash === "#history") {
      return (
        <div className="h-full overflow-auto p-6">
          <RunHistoryTable />
        </div>
      );
    }

    const picker =
      hash === "#services" ? (
        <ServicesList running={status.running} onStarted={refresh} />
      ) : (
        <ActionPicker running={status.running} onStarted={refresh} />
      );

    return (
      <div className="grid h-full min-h-0 gap-6 p-6 lg:grid-cols-2">
        <div className="min-h-0 overflow-auto">{picker}</div>
        <LogPanel
          log={status.log}
          running={status.running}
          onChanged={refresh}
          autoRefresh={autoRefresh}
          onAutoRefreshChange={setAutoRefresh}
        />
      </div>
    );
  };

  const title = navItems.find((item) => item.url === hash)?.title ?? "Actions";

  return (
    <div className="flex h-svh w-full">
      <nav className="flex w-52 shrink-0 flex-col gap-1 border-r border-zinc-800 p-3">
        <div className="mb-4 px-2 text-sm font-semibold">Router Console</div>
        {navItems.map((item) => (
          <a
            key={item.url}
            href={item.url}
            className={`flex items-center gap-2 rounded px-2 py-1.5 text-sm ${
              item.title === title ? "bg-zinc-800" : "hover:bg-zinc-900"
            }`}
          >
            <item.icon className="h-4 w-4" />
            {item.title}
          </a>
        ))}
      </nav>
      <main className="flex min-w-0 flex-1 flex-col">
        <header className="flex h-14 shrink-0 items-center gap-2 border-b border-zinc-800 px-4">
          <div className="font-medium">{title}</div>
          {status.error && <span className="text-xs text-red-400">{status.error}</span>}
          <div className="ml-auto flex items-center gap-2">
            <SyncStatus status={syncStatus} />
          </div>
        </header>
        <div className="flex-1 overflow-hidden">{renderContent()}</div>
      </main>
    </div>
  );
}

export function App() {
  const [syncStatus, setSyncStatus] = useState("connecting");

  const store = useCreateMergeableStore(createAppStore);

  useCreateSynchronizer(store, async (store: MergeableStore) => {
    const ws = new ReconnectingWebSocket(SYNC_PATH);

    ws.addEventListener("open", () => setSyncStatus("connected"));
    ws.addEventListener("close", () => setSyncStatus("disconnected"));
    ws.addEventListener("error", () => setSyncStatus("disconnected"));

    const synchronizer = await createWsSynchronizer(store, ws, 1);
    await synchronizer.startSync();

    synchronizer.getWebSocket().addEventListener("open", () => {
      synchronizer
        .load()
        .then(() => synchronizer.save())
        .catch((err: unknown) => console.error("[sync] Reload failed:", err));
    });

    return synchronizer;
  });

  return (
    <StrictMode>
      <Provider store={store}>
        <div className="dark min-h-screen bg-zinc-950 text-zinc-100">
          <MainView syncStatus={syncStatus} />
        </div>
      </Provider>
    </StrictMode>
  );
}
