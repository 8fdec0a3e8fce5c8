// Small utilities for day keys and elapsed-time labels

const pad = (n: number) => String(n).padStart(2, "0");

/** local calendar day as "YYYY-MM-DD" */
export function dayKey(timestamp: number): string {
  const d = new Date(timestamp);
  return `${d.getFullYear()}-${pad(d.getMonth() + 1)}-${pad(d.getDate())}`;
}

export function minutesToMs(minutes: number): number {
  if (!Number.isFinite(minutes)) return 0;
  return Math.max(0, minutes) * 60_000;
}

// "just now", "12m", "1h", "2h 5m"
export function formatDuration(ms: number): string {
  if (!Number.isFinite(ms) || ms < 0) return "just now";
  const minutes = Math.round(ms / 60_000);
  if (minutes < 1) return "just now";
  if (minutes < 60) return `${minutes}m`;
  const hours = Math.floor(minutes / 60);
  const rest = minutes % 60;
  return rest ? `${hours}h ${rest}m` : `${hours}h`;
}
