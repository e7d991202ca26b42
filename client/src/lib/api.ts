// API client for the router console
// HTTP client for the runner routes served next to the dashboard

import type { RunSource, RunStatus } from "@/store";

const API_BASE = "/api";

export type ActionParam = "dns1" | "dns2" | "packages" | "ssid" | "key" | "band" | "ipaddr";

export interface ActionSummary {
  name: string;
  title: string;
  category: string;
  confirm: string | null;
  params: ActionParam[];
}

export interface RunnerStatus {
  running: boolean;
  log: string;
}

export interface RunResponse {
  success: boolean;
  error?: string;
}

export interface ServiceEntry {
  name: string;
  title?: string;
  description?: string;
  category?: string;
  icon?: string;
}

export interface RunSummary {
  id: string;
  action: string;
  args: string[];
  source: RunSource;
  status: RunStatus;
  code: number;
  startedAt: number;
  finishedAt: number;
}

async function fetchJSON<T>(path: string, options?: RequestInit): Promise<T> {
  const response = await fetch(`${API_BASE}${path}`, {
    ...options,
    headers: {
      "Content-Type": "application/json",
      ...options?.headers,
    },
  });

  if (!response.ok) {
    const body: unknown = await response.json().catch(() => null);
    const message =
      body && typeof body === "object" && "error" in body && typeof body.error === "string"
        ? body.error
        : `Request failed: ${response.status}`;
    throw new Error(message);
  }

  return response.json();
}

export function refusalMessage(result: RunResponse): string | null {
  if (result.success) return null;
  return result.error ?? "The action could not be started.";
}

// Runner
export async function getStatus() {
  return fetchJSON<RunnerStatus>("/status");
}

export async function runAction(action: string, params: Partial<Record<ActionParam, string>> = {}) {
  return fetchJSON<RunResponse>("/run", {
    method: "POST",
    body: JSON.stringify({ action, ...params }),
  });
}

export async function stopAction() {
  return runAction("stop_process");
}

export async function clearLog() {
  return runAction("clear_log");
}

// Terminal
export async function getTerminal() {
  return fetchJSON<{ port: string; ssl: boolean } | { error: string }>("/terminal");
}

// Catalogs
export async function listActions() {
  return fetchJSON<{ actions: ActionSummary[] }>("/actions");
}

export async function listServices() {
  return fetchJSON<{ services: ServiceEntry[]; error?: string }>("/services");
}

export async function listRuns(limit = 50) {
  return fetchJSON<{ runs: RunSummary[] }>(`/runs?limit=${limit}`);
}
