/**
 * Local-time formatting used in audit lines and stored file names
 */

function pad(value: number, width = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * `YYYY-MM-DD HH:MM:SS` in local time
 */
export function formatLogTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}-${pad(date.getMonth() + 1)}-${pad(date.getDate())} ` +
    `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`
  );
}

/**
 * `YYYYMMDD_HHMMSS` in local time, safe for file names
 */
export function formatFileTimestamp(date: Date): string {
  return (
    `${date.getFullYear()}${pad(date.getMonth() + 1)}${pad(date.getDate())}_` +
    `${pad(date.getHours())}${pad(date.getMinutes())}${pad(date.getSeconds())}`
  );
}

/**
 * Parse a `YYYY-MM-DD HH:MM:SS` local timestamp
 * @returns The date, or undefined when the text does not match
 */
export function parseLogTimestamp(text: string): Date | undefined {
  const match = /^(\d{4})-(\d{2})-(\d{2}) (\d{2}):(\d{2}):(\d{2})$/.exec(text);
  if (!match) return undefined;

  const [, year, month, day, hours, minutes, seconds] = match.map(Number);
  return new Date(year, month - 1, day, hours, minutes, seconds);
}

/**
 * Source of the current time; injected wherever timestamps end up on disk
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();
