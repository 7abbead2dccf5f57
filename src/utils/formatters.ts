/**
 * Formatting utilities for consistent display across commands and status text
 */

/**
 * Pick the singular or plural form for a count, substituting `%1` with the count.
 *
 * @example
 * plural(1, '1 new update', '%1 new updates') // => '1 new update'
 * plural(3, '1 new update', '%1 new updates') // => '3 new updates'
 */
export function plural(count: number, singular: string, pluralForm: string): string {
  return (count === 1 ? singular : pluralForm).replace('%1', String(count));
}

/**
 * Format a byte count with binary units, one decimal above bytes.
 *
 * @example
 * formatBytes(512) // => '512 B'
 * formatBytes(1536) // => '1.5 KiB'
 */
export function formatBytes(bytes: number): string {
  const units = ['B', 'KiB', 'MiB', 'GiB', 'TiB'];
  let value = bytes;
  let unit = 0;
  while (value >= 1024 && unit < units.length - 1) {
    value /= 1024;
    unit++;
  }
  return unit === 0 ? `${value} ${units[unit]}` : `${value.toFixed(1)} ${units[unit]}`;
}

/**
 * Format how long ago an instant was, relative to `now`.
 *
 * @example
 * formatRelativeTime(now - 90_000, now) // => '1 minute ago'
 */
export function formatRelativeTime(timestampMs: number, now: number = Date.now()): string {
  const seconds = Math.floor((now - timestampMs) / 1000);
  if (seconds < 60) {
    return 'just now';
  }
  const minutes = Math.floor(seconds / 60);
  if (minutes < 60) {
    return plural(minutes, '1 minute ago', '%1 minutes ago');
  }
  const hours = Math.floor(minutes / 60);
  if (hours < 24) {
    return plural(hours, '1 hour ago', '%1 hours ago');
  }
  const days = Math.floor(hours / 24);
  if (days < 7) {
    return days === 1 ? 'yesterday' : `${days} days ago`;
  }
  return new Date(timestampMs).toISOString().slice(0, 10);
}
