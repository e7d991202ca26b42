import { useEffect, useRef } from "react";
import { Eraser, RefreshCw, Square } from "lucide-react";
import { useRunnerCommand } from "@/hooks/useApi";
import { clearLog, stopAction } from "@/lib/api";

interface LogPanelProps {
  log: string;
  running: boolean;
  onChanged?: () => void;
  autoRefresh: boolean;
  onAutoRefreshChange: (value: boolean) => void;
}

export function LogPanel({ log, running, onChanged, autoRefresh, onAutoRefreshChange }: LogPanelProps) {
  const stop = useRunnerCommand(stopAction, onChanged);
  const clear = useRunnerCommand(clearLog, onChanged);
  const endRef = useRef<HTMLDivElement>(null);

  useEffect(() => {
    endRef.current?.scrollIntoView({ block: "end" });
  }, [log]);

  return (
    <div className="flex h-full min-h-0 flex-col rounded-lg border border-zinc-800">
      <div className="flex items-center gap-2 border-b border-zinc-800 px-3 py-2">
        <span className="text-sm font-medium">Output</span>
        {running && <span className="text-xs text-blue-400">running…</span>}
        <div className="ml-auto flex items-center gap-2">
          <label className="inline-flex items-center gap-1 text-xs text-zinc-400">
            <input
              type="checkbox"
              checked={autoRefresh}
              onChange={(e) => onAutoRefreshChange(e.target.checked)}
            />
            Auto-refresh
          </label>
          {!autoRefresh && (
            <button
              onClick={onChanged}
              className="inline-flex items-center gap-1 rounded px-2 py-1 text-xs hover:bg-zinc-800"
            >
              <RefreshCw className="h-3 w-3" />
              Refresh
            </button>
          )}
          <button
            onClick={() => void stop.send()}
            disabled={!running || stop.loading}
            className="inline-flex items-center gap-1 rounded px-2 py-1 text-xs hover:bg-zinc-800 disabled:opacity-40"
          >
            <Square className="h-3 w-3" />
            Stop
          </button>
          <button
            onClick={() => void clear.send()}
            disabled={clear.loading}
            className="inline-flex items-center gap-1 rounded px-2 py-1 text-xs hover:bg-zinc-800 disabled:opacity-40"
          >
            <Eraser className="h-3 w-3" />
            Clear
          </button>
        </div>
      </div>
      {(stop.error || clear.error) && (
        <p className="border-b border-zinc-800 px-3 py-2 text-xs text-red-400">{stop.error ?? clear.error}</p>
      )}
      <pre className="flex-1 overflow-auto whitespace-pre-wrap p-3 font-mono text-xs text-zinc-300">
        {log || "No output yet."}
        <div ref={endRef} />
      </pre>
    </div>
  );
}
