import { useEffect } from "react";
import { useApiCall } from "@/hooks/useApi";
import { getTerminal } from "@/lib/api";

export function terminalUrl(info: { port: string; ssl: boolean }, hostname: string): string {
  return `${info.ssl ? "https" : "http"}://${hostname}:${info.port}`;
}

export function TerminalPanel() {
  const terminal = useApiCall(getTerminal);
  const load = terminal.execute;

  useEffect(() => {
    void load();
  }, [load]);

  const info = terminal.data;
  if (terminal.loading || !info) {
    return <p className="p-6 text-sm text-zinc-400">{terminal.error ?? "Loading terminal…"}</p>;
  }
  if ("error" in info) {
    return <p className="p-6 text-sm text-red-400">{info.error}</p>;
  }

  return (
    <iframe
      title="Terminal"
      src={terminalUrl(info, window.location.hostname)}
      className="h-full w-full border-0 bg-black"
    />
  );
}
