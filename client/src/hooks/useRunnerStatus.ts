import { useCallback, useEffect, useState } from "react";
import { getStatus, type RunnerStatus } from "@/lib/api";
import { statusPollDelay } from "@/lib/polling";

/**
 * Poll /api/status; every 2 s while an action runs when auto-refresh is on
 */
export function useRunnerStatus(autoRefresh: boolean) {
  const [status, setStatus] = useState<RunnerStatus>({ running: false, log: "" });
  const [error, setError] = useState<string | null>(null);

  const refresh = useCallback(async () => {
    try {
      setStatus(await getStatus());
      setError(null);
    } catch (err) {
      setError(err instanceof Error ? err.message : "Unknown error");
    }
  }, []);

  useEffect(() => {
    void refresh();
  }, [refresh]);

  const delay = statusPollDelay(autoRefresh, status.running);
  useEffect(() => {
    if (delay === null) return;
    const timer = setInterval(() => void refresh(), delay);
    return () => clearInterval(timer);
  }, [refresh, delay]);

  return { ...status, error, refresh };
}
