import { useEffect } from "react";
import { Play } from "lucide-react";
import { useApiCall, useRunnerCommand } from "@/hooks/useApi";
import { listServices, runAction } from "@/lib/api";

interface ServicesListProps {
  running: boolean;
  onStarted?: () => void;
}

/**
 * Services from the downloaded catalog. Their names are not local actions,
 * so the server hands them to the service runner.
 */
export function ServicesList({ running, onStarted }: ServicesListProps) {
  const services = useApiCall(listServices);
  const run = useRunnerCommand(runAction, onStarted);
  const load = services.execute;

  useEffect(() => {
    void load();
  }, [load]);

  const entries = services.data?.services ?? [];

  return (
    <div className="flex flex-col gap-2">
      {services.error && <p className="text-sm text-red-400">{services.error}</p>}
      {run.error && <p className="text-sm text-red-400">{run.error}</p>}
      {entries.length === 0 && !services.loading && (
        <p className="text-sm text-zinc-400">No services listed. Run "Update service list" first.</p>
      )}
      {entries.map((service) => (
        <div key={service.name} className="flex items-center gap-3 rounded border border-zinc-800 px-3 py-2">
          <div className="min-w-0 flex-1">
            <div className="truncate text-sm font-medium">{service.title ?? service.name}</div>
            {service.description && <div className="truncate text-xs text-zinc-500">{service.description}</div>}
          </div>
          <button
            onClick={() => void run.send(service.name)}
            disabled={running || run.loading}
            className="inline-flex items-center gap-1 rounded px-2 py-1 text-xs hover:bg-zinc-800 disabled:opacity-40"
          >
            <Play className="h-3 w-3" />
            Install
          </button>
        </div>
      ))}
    </div>
  );
}
