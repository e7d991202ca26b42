// Hooks for the runner API
// Track loading and error state around one API function

import { useState, useCallback } from "react";
import { type RunResponse, refusalMessage } from "@/lib/api";

export interface ApiState<T> {
  data: T | null;
  loading: boolean;
  error: string | null;
}

const idle = { data: null, loading: false, error: null };

export function useApiCall<T, Args extends unknown[]>(
  apiFunction: (...args: Args) => Promise<T>
) {
  const [state, setState] = useState<ApiState<T>>(idle);

  const execute = useCallback(
    async (...args: Args): Promise<T | null> => {
      setState((prev) => ({ ...prev, loading: true, error: null }));

      try {
        const data = await apiFunction(...args);
        setState({ data, loading: false, error: null });
        return data;
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : "Unknown error";
        setState((prev) => ({ ...prev, loading: false, error: errorMessage }));
        return null;
      }
    },
    [apiFunction]
  );

  return { ...state, execute };
}

/**
 * Wraps a call to POST /api/run. The runner answers refusals (lock held,
 * bad action name) with 200 and `success: false`, so those land in `error`
 * the same way a failed request does. `onDone` fires only for accepted calls.
 */
export function useRunnerCommand<Args extends unknown[]>(
  command: (...args: Args) => Promise<RunResponse>,
  onDone?: () => void
) {
  const [state, setState] = useState<ApiState<RunResponse>>(idle);

  const send = useCallback(
    async (...args: Args): Promise<boolean> => {
      setState({ data: null, loading: true, error: null });

      try {
        const result = await command(...args);
        const refused = refusalMessage(result);
        setState({ data: result, loading: false, error: refused });
        if (refused) return false;
        onDone?.();
        return true;
      } catch (err) {
        const errorMessage = err instanceof Error ? err.message : "Unknown error";
        setState({ data: null, loading: false, error: errorMessage });
        return false;
      }
    },
    [command, onDone]
  );

  const reset = useCallback(() => setState(idle), []);

  return { ...state, send, reset };
}
