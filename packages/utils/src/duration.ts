/**
 * Format duration in milliseconds, e.g. "850ms" or "1.4s".
 */
export function formatDuration(ms: number): string {
  if (ms < 1000) {
    return `${ms}ms`;
  }
  return `${(ms / 1000).toFixed(1)}s`;
}
