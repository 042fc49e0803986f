const UNITS = ["B", "KB", "MB", "GB"] as const;

/** Human-readable size in 1024 steps, GB being the largest unit. */
export function formatBytes(bytes: number): string {
  let size = bytes;
  let unit = 0;
  while (size >= 1024 && unit < UNITS.length - 1) {
    size /= 1024;
    unit++;
  }
  if (unit === 0) {
    return `${bytes} ${UNITS[0]}`;
  }
  return `${size.toFixed(1)} ${UNITS[unit]}`;
}
