import { useMemo, useState } from "react";
import {
  type ColumnDef,
  type SortingState,
  flexRender,
  getCoreRowModel,
  getSortedRowModel,
  useReactTable,
} from "@tanstack/react-table";
import { ChevronDownIcon, ChevronUpIcon } from "lucide-react";
import { useTable } from "tinybase/ui-react";
import type { RunStatus } from "@/store";
import { RunStatusBadge } from "./RunStatusBadge";

interface RunRow {
  id: string;
  action: string;
  args: string;
  source: string;
  status: RunStatus;
  code: number;
  startedAt: number;
  finishedAt: number;
}

function asStatus(value: unknown): RunStatus {
  return value === "completed" || value === "failed" || value === "stopped" ? value : "running";
}

function formatArgs(value: unknown): string {
  if (typeof value !== "string") return "";
  try {
    const parsed: unknown = JSON.parse(value);
    return Array.isArray(parsed) ? parsed.filter((a) => a !== "").join(" ") : "";
  } catch {
    return "";
  }
}

function formatDuration(row: RunRow): string {
  if (!row.finishedAt) return "-";
  const seconds = Math.round((row.finishedAt - row.startedAt) / 1000);
  return seconds < 60 ? `${seconds}s` : `${Math.floor(seconds / 60)}m ${seconds % 60}s`;
}

export function RunHistoryTable() {
  const runs = useTable("actionRuns");
  const [sorting, setSorting] = useState<SortingState>([{ id: "startedAt", desc: true }]);

  const data = useMemo<RunRow[]>(
    () =>
      Object.entries(runs).map(([id, row]) => ({
        id,
        action: typeof row.action === "string" ? row.action : "",
        args: formatArgs(row.args),
        source: typeof row.source === "string" ? row.source : "",
        status: asStatus(row.status),
        code: typeof row.code === "number" ? row.code : 0,
        startedAt: typeof row.startedAt === "number" ? row.startedAt : 0,
        finishedAt: typeof row.finishedAt === "number" ? row.finishedAt : 0,
      })),
    [runs]
  );

  const columns = useMemo<ColumnDef<RunRow>[]>(
    () => [
      {
        accessorKey: "action",
        header: "Action",
        cell: ({ row }) => (
          <div className="min-w-0">
            <div className="truncate font-medium">{row.original.action}</div>
            {row.original.args && <div className="truncate text-xs text-zinc-500">{row.original.args}</div>}
          </div>
        ),
      },
      {
        accessorKey: "status",
        header: "Status",
        cell: ({ row }) => <RunStatusBadge status={row.original.status} />,
      },
      {
        accessorKey: "code",
        header: "Exit",
        cell: ({ row }) => (row.original.status === "running" ? "-" : row.original.code),
      },
      { accessorKey: "source", header: "Source" },
      {
        accessorKey: "startedAt",
        header: "Started",
        cell: ({ row }) => new Date(row.original.startedAt).toLocaleString(),
      },
      {
        id: "duration",
        header: "Duration",
        cell: ({ row }) => formatDuration(row.original),
      },
    ],
    []
  );

  const table = useReactTable({
    data,
    columns,
    state: { sorting },
    onSortingChange: setSorting,
    getCoreRowModel: getCoreRowModel(),
    getSortedRowModel: getSortedRowModel(),
  });

  if (data.length === 0) {
    return <p className="text-sm text-zinc-400">No runs recorded yet.</p>;
  }

  return (
    <table className="w-full text-sm">
      <thead>
        {table.getHeaderGroups().map((group) => (
          <tr key={group.id} className="border-b border-zinc-800 text-left text-zinc-400">
            {group.headers.map((header) => (
              <th key={header.id} className="px-3 py-2 font-medium">
                <button
                  onClick={header.column.getToggleSortingHandler()}
                  className="inline-flex items-center gap-1"
                  disabled={!header.column.getCanSort()}
                >
                  {flexRender(header.column.columnDef.header, header.getContext())}
                  {header.column.getIsSorted() === "asc" && <ChevronUpIcon className="h-3 w-3" />}
                  {header.column.getIsSorted() === "desc" && <ChevronDownIcon className="h-3 w-3" />}
                </button>
              </th>
            ))}
          </tr>
        ))}
      </thead>
      <tbody>
        {table.getRowModel().rows.map((row) => (
          <tr key={row.id} className="border-b border-zinc-900">
            {row.getVisibleCells().map((cell) => (
              <td key={cell.id} className="px-3 py-2 align-top">
                {flexRender(cell.column.columnDef.cell, cell.getContext())}
              </td>
            ))}
          </tr>
        ))}
      </tbody>
    </table>
  );
}
