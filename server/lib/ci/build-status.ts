// Firmware build status reporting for CI
// Updates users/<user>/builds/<build> in Firestore through the gcloud CLI

import { type Executor, quote } from "../exec";

export interface BuildStatusUpdate {
  projectId: string;
  userId: string;
  buildId: string;
  status: string;
  downloadUrl?: string;
}

export function buildDocumentPath(userId: string, buildId: string): string {
  return `users/${userId}/builds/${buildId}`;
}

/**
 * Firestore fields for a status. Only "completed" keeps a download URL.
 */
export function buildUpdateFields(status: string, downloadUrl?: string): string {
  if (status === "completed") {
    if (!downloadUrl) {
      throw new Error("Download URL is required for 'completed' status.");
    }
    return `status=completed,downloadUrl=${downloadUrl}`;
  }
  return "status=failed,downloadUrl=null";
}

export function buildStatusCommand(update: BuildStatusUpdate): string {
  const path = buildDocumentPath(update.userId, update.buildId);
  const fields = buildUpdateFields(update.status, update.downloadUrl);
  return [
    "gcloud beta firestore documents update",
    quote(path),
    `--update-fields=${quote(fields)}`,
    `--project=${quote(update.projectId)}`,
  ].join(" ");
}

export async function updateBuildStatus(update: BuildStatusUpdate, exec: Executor): Promise<void> {
  for (const [name, value] of Object.entries({
    projectId: update.projectId,
    userId: update.userId,
    buildId: update.buildId,
    status: update.status,
  })) {
    if (!value) throw new Error(`Missing required argument: ${name}`);
  }

  const command = buildStatusCommand(update);
  console.log(`[ci] Updating ${buildDocumentPath(update.userId, update.buildId)} to ${update.status}`);

  const result = await exec.run(command, {
    timeout: 120000,
    onLine: (line) => console.log(`[ci] ${line}`),
  });
  if (result.code !== 0) {
    throw new Error(`gcloud exited with code ${result.code}: ${result.stderr.trim()}`);
  }

  console.log("[ci] Firestore update completed successfully.");
}
