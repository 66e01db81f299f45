function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Local wall-clock time as `YYYY-MM-DD HH:MM:SS.ffffff`. Dates only carry
 * milliseconds, so the last three fractional digits are always zero.
 */
export function formatTimestamp(date: Date): string {
  const day = `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())}`;
  const time = `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
  return `${day} ${time}.${pad(date.getMilliseconds() * 1000, 6)}`;
}

/** Seconds since the epoch, fractional. */
export function toEpochSeconds(date: Date): number {
  return date.getTime() / 1000;
}
