const DECIMAL_UNITS = ["Bytes", "KB", "MB", "GB", "TB", "PB", "EB"];
const BINARY_UNITS = ["Bytes", "KiB", "MiB", "GiB", "TiB", "PiB", "EiB"];

/**
 * Human-readable byte count, e.g. `formatBytes(1536, 2)` -> "1.50 KiB".
 * Null or negative sizes render as "unknown".
 */
export function formatBytes(value: number | null, base: 10 | 2 = 10): string {
  if (value === null || value < 0) return "unknown";

  const units = base === 10 ? DECIMAL_UNITS : BINARY_UNITS;
  const divisor = base === 10 ? 1000 : 1024;

  let amount = value;
  let unitIndex = 0;
  while (amount >= divisor && unitIndex < units.length - 1) {
    amount /= divisor;
    unitIndex++;
  }
  return `${amount.toFixed(2)} ${units[unitIndex]}`;
}

/**
 * "42.0%" style progress, or "" when the total is unknown.
 */
export function formatPercent(transferred: number, total: number | null): string {
  if (!total) return "";
  return `${((transferred / total) * 100).toFixed(1)}%`;
}
