import { CheckCircle2, Loader2, Square, XCircle } from "lucide-react";
import type { RunStatus } from "@/store";

const styles: Record<RunStatus, { className: string; label: string; Icon: typeof CheckCircle2 }> = {
  running: { className: "bg-blue-500/15 text-blue-400", label: "Running", Icon: Loader2 },
  completed: { className: "bg-emerald-500/15 text-emerald-400", label: "Completed", Icon: CheckCircle2 },
  failed: { className: "bg-red-500/15 text-red-400", label: "Failed", Icon: XCircle },
  stopped: { className: "bg-amber-500/15 text-amber-400", label: "Stopped", Icon: Square },
};

export function RunStatusBadge({ status }: { status: RunStatus }) {
  const { className, label, Icon } = styles[status];
  return (
    <span className={`inline-flex items-center gap-1 rounded px-2 py-0.5 text-xs font-medium ${className}`}>
      <Icon className={`h-3 w-3 ${status === "running" ? "animate-spin" : ""}`} />
      {label}
    </span>
  );
}
