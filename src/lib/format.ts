const MS_PER_SECOND = 1000;
const SECONDS_PER_DAY = 86400;

/**
 * Human-readable distance: kilometers from 1000 m upwards, meters below,
 * always with two decimals.
 */
export function formatDistance(meters: number): string {
  if (meters >= 1000) {
    return `${(meters / 1000).toFixed(2)} km`;
  }
  return `${meters.toFixed(2)} m`;
}

function pad(value: number, width: number = 2): string {
  return String(value).padStart(width, '0');
}

/**
 * Format a duration as H:MM:SS, prefixed with whole days when it spans
 * more than 24 hours ("2 days, 3:04:05"). Sub-second remainders show as
 * ".mmm".
 */
export function formatDuration(ms: number): string {
  const sign = ms < 0 ? '-' : '';
  const abs = Math.round(Math.abs(ms));

  const totalSeconds = Math.floor(abs / MS_PER_SECOND);
  const millis = abs % MS_PER_SECOND;
  const days = Math.floor(totalSeconds / SECONDS_PER_DAY);
  const hours = Math.floor((totalSeconds % SECONDS_PER_DAY) / 3600);
  const minutes = Math.floor((totalSeconds % 3600) / 60);
  const seconds = totalSeconds % 60;

  let clock = `${hours}:${pad(minutes)}:${pad(seconds)}`;
  if (millis > 0) {
    clock += `.${pad(millis, 3)}`;
  }

  if (days > 0) {
    return `${sign}${days} ${days === 1 ? 'day' : 'days'}, ${clock}`;
  }
  return `${sign}${clock}`;
}

/**
 * Render a timestamp as "YYYY-MM-DD HH:MM UTC"
 */
export function formatTimestamp(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 16)} UTC`;
}

// YYYY-MM-DD, optional [T ]hh:mm[:ss[.fff]], optional Z or ±hh[:]mm
const ISO_TIMESTAMP_PATTERN =
  /^(\d{4}-\d{2}-\d{2})(?:[Tt ](\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?))?(Z|z|[+-]\d{2}:?\d{2})?$/;

/**
 * Parse a GPX <time> value. Times without an offset are UTC. Returns null
 * for empty text and anything that is not an ISO 8601 date or date-time.
 */
export function parseTimestamp(text: string | null): Date | null {
  const match = ISO_TIMESTAMP_PATTERN.exec(text?.trim() ?? '');
  if (!match) {
    return null;
  }
  const [, date, time = '00:00', zone = 'Z'] = match;
  const offset = zone.length === 5 ? `${zone.slice(0, 3)}:${zone.slice(3)}` : zone.toUpperCase();
  const ms = Date.parse(`${date}T${time}${offset}`);
  return Number.isNaN(ms) ? null : new Date(ms);
}
