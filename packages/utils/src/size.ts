/**
 * Size Utilities
 *
 * Binary units throughout: 1 MB = 1024^2 bytes, 1 GB = 1024^3 bytes.
 */

export const BYTES_PER_MB = 1024 ** 2;
export const BYTES_PER_GB = 1024 ** 3;

export function mbToBytes(mb: number): number {
  return Math.round(mb * BYTES_PER_MB);
}

export function gbToBytes(gb: number): number {
  return Math.round(gb * BYTES_PER_GB);
}

/**
 * Format bytes as gigabytes with a fixed number of decimals (no unit suffix)
 */
export function formatGb(bytes: number, decimals: number = 2): string {
  return (bytes / BYTES_PER_GB).toFixed(decimals);
}

/**
 * Format bytes as megabytes with a fixed number of decimals (no unit suffix)
 */
export function formatMb(bytes: number, decimals: number = 2): string {
  return (bytes / BYTES_PER_MB).toFixed(decimals);
}
