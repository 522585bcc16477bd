import type { ProgressUpdate } from '../types/cloudflare';

export function formatProgressLine(update: ProgressUpdate): string {
  return `${update.activity}: ${update.status} - ${update.currentOperation} [${update.percent}%]`;
}

/**
 * Prints one progress line. Default reporter for long-running fetches.
 */
export function writeProgress(update: ProgressUpdate): void {
  console.log(formatProgressLine(update));
}

// Rounded share of `completed` over `total`, 100 when there is nothing to do
export function percentComplete(completed: number, total: number): number {
  if (total <= 0) return 100;
  return Math.round((completed / total) * 100);
}
