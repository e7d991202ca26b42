import { useEffect, useMemo, useState } from "react";
import { Play } from "lucide-react";
import { useApiCall, useRunnerCommand } from "@/hooks/useApi";
import { type ActionSummary, listActions, runAction } from "@/lib/api";
import { type ParamValues, paramsForRun, validateParams } from "@/lib/run-params";
import { ActionParamsForm } from "./ActionParamsForm";
import { ConfirmDialog } from "./ConfirmDialog";

interface ActionPickerProps {
  running: boolean;
  onStarted?: () => void;
}

const CATEGORY_TITLES: Record<string, string> = {
  proxy: "Proxy",
  dns: "DNS",
  network: "Network",
  wireless: "Wireless",
  packages: "Packages",
  optimization: "Optimization",
  system: "System",
};

export function ActionPicker({ running, onStarted }: ActionPickerProps) {
  const actions = useApiCall(listActions);
  const run = useRunnerCommand(runAction, onStarted);
  const [selected, setSelected] = useState<ActionSummary | null>(null);
  const [values, setValues] = useState<ParamValues>({});
  const [confirming, setConfirming] = useState(false);
  const [formError, setFormError] = useState<string | null>(null);

  const loadActions = actions.execute;
  useEffect(() => {
    void loadActions();
  }, [loadActions]);

  const grouped = useMemo(() => {
    const groups = new Map<string, ActionSummary[]>();
    for (const action of actions.data?.actions ?? []) {
      groups.set(action.category, [...(groups.get(action.category) ?? []), action]);
    }
    return [...groups.entries()];
  }, [actions.data]);

  const select = (action: ActionSummary) => {
    setSelected(action);
    setValues({});
    setFormError(null);
    run.reset();
  };

  const submit = async () => {
    if (!selected) return;
    setConfirming(false);
    await run.send(selected.name, paramsForRun(selected.params, values));
  };

  const requestRun = () => {
    if (!selected) return;
    const problem = validateParams(selected.params, values);
    setFormError(problem);
    if (problem) return;
    if (selected.confirm) setConfirming(true);
    else void submit();
  };

  return (
    <div className="flex flex-col gap-4">
      {actions.error && <p className="text-sm text-red-400">{actions.error}</p>}

      {grouped.map(([category, items]) => (
        <section key={category}>
          <h3 className="mb-2 text-xs font-semibold uppercase tracking-wide text-zinc-500">
            {CATEGORY_TITLES[category] ?? category}
          </h3>
          <div className="flex flex-wrap gap-2">
            {items.map((action) => (
              <button
                key={action.name}
                onClick={() => select(action)}
                className={`rounded border px-3 py-1.5 text-sm ${
                  selected?.name === action.name
                    ? "border-blue-500 bg-blue-500/10"
                    : "border-zinc-700 hover:bg-zinc-800"
                }`}
              >
                {action.title}
              </button>
            ))}
          </div>
        </section>
      ))}

      {selected && (
        <div className="rounded-lg border border-zinc-800 p-4">
          <div className="mb-3 font-medium">{selected.title}</div>
          <ActionParamsForm params={selected.params} values={values} onChange={setValues} disabled={running} />
          {(formError || run.error) && <p className="mt-3 text-sm text-red-400">{formError ?? run.error}</p>}
          <button
            onClick={requestRun}
            disabled={running || run.loading}
            className="mt-4 inline-flex items-center gap-2 rounded bg-blue-600 px-3 py-1.5 text-sm font-medium hover:bg-blue-500 disabled:opacity-50"
          >
            <Play className="h-4 w-4" />
            Run
          </button>
        </div>
      )}

      {confirming && selected?.confirm && (
        <ConfirmDialog
          title={selected.title}
          message={selected.confirm}
          onConfirm={() => void submit()}
          onCancel={() => setConfirming(false)}
        />
      )}
    </div>
  );
}
