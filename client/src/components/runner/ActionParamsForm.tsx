import type { ActionParam } from "@/lib/api";
import { PARAM_FIELDS, type ParamValues } from "@/lib/run-params";

interface ActionParamsFormProps {
  params: readonly ActionParam[];
  values: ParamValues;
  onChange: (values: ParamValues) => void;
  disabled?: boolean;
}

export function ActionParamsForm({ params, values, onChange, disabled }: ActionParamsFormProps) {
  if (params.length === 0) return null;

  return (
    <div className="grid gap-3 sm:grid-cols-2">
      {params.map((name) => {
        const field = PARAM_FIELDS[name];
        const id = `param-${name}`;
        const update = (value: string) => onChange({ ...values, [name]: value });

        return (
          <label key={name} htmlFor={id} className="flex flex-col gap-1 text-sm">
            <span className="text-zinc-400">{field.label}</span>
            {field.type === "select" ? (
              <select
                id={id}
                value={values[name] ?? field.options?.[0] ?? ""}
                onChange={(e) => update(e.target.value)}
                disabled={disabled}
                className="rounded border border-zinc-700 bg-zinc-950 px-2 py-1.5"
              >
                {field.options?.map((option) => (
                  <option key={option} value={option}>
                    {option}
                  </option>
                ))}
              </select>
            ) : (
              <input
                id={id}
                type={field.type}
                value={values[name] ?? ""}
                placeholder={field.placeholder}
                onChange={(e) => update(e.target.value)}
                disabled={disabled}
                className="rounded border border-zinc-700 bg-zinc-950 px-2 py-1.5"
              />
            )}
          </label>
        );
      })}
    </div>
  );
}
