export const TIME_PATTERN = /^([01]?\d|2[0-3]):([0-5]\d)(?::([0-5]\d))?$/;
export const DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MINUTES_PER_DAY = 24 * 60;

function pad(value: number): string {
  return String(value).padStart(2, '0');
}

export function isTimeOfDay(value: string): boolean {
  return TIME_PATTERN.test(value);
}

/** Accepts `H:MM`, `HH:MM` or `HH:MM:SS` and returns `HH:MM:SS`. */
export function normalizeTimeOfDay(value: string): string {
  const match = TIME_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Invalid time of day: ${value}`);
  }
  const [, hours, minutes, seconds] = match;
  return `${pad(Number(hours))}:${minutes}:${seconds ?? '00'}`;
}

/**
 * Adds minutes to a time of day. Shows that run past midnight end on the next day,
 * so the result wraps around 24:00.
 */
export function addMinutesToTime(time: string, minutes: number): string {
  const [hours, mins, secs] = normalizeTimeOfDay(time).split(':').map(Number);
  const total = (((hours * 60 + mins + minutes) % MINUTES_PER_DAY) + MINUTES_PER_DAY) % MINUTES_PER_DAY;
  return `${pad(Math.floor(total / 60))}:${pad(total % 60)}:${pad(secs)}`;
}

export function isIsoDate(value: string): boolean {
  if (!DATE_PATTERN.test(value)) {
    return false;
  }
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

/** Calendar date of `now` in the server's local time zone, as `YYYY-MM-DD`. */
export function toIsoDate(now: Date = new Date()): string {
  return `${now.getFullYear()}-${pad(now.getMonth() + 1)}-${pad(now.getDate())}`;
}

export function addDays(isoDate: string, days: number): string {
  const date = new Date(`${isoDate}T00:00:00Z`);
  date.setUTCDate(date.getUTCDate() + days);
  return date.toISOString().slice(0, 10);
}
