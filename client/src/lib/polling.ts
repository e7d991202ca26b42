export const STATUS_POLL_MS = 2000;
// Slow poll while idle so runs started from the CLI still show up
export const IDLE_POLL_MS = 10000;

/**
 * Delay before the next /api/status poll, or null when auto-refresh is off
 */
export function statusPollDelay(autoRefresh: boolean, running: boolean): number | null {
  if (!autoRefresh) return null;
  return running ? STATUS_POLL_MS : IDLE_POLL_MS;
}
