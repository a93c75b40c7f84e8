/**
 * Time formatting helpers.
 *
 * - Single timestamp format for log entries.
 * - Duration formatting shared by logs and user-facing timeout messages.
 */
export function getTimestamp(): string {
  return new Date().toISOString();
}

export function formatDuration(ms: number): string {
  if (ms < 1000) return `${ms}ms`;
  if (ms < 60000) return `${(ms / 1000).toFixed(1)}s`;
  return `${(ms / 60000).toFixed(1)}m`;
}
