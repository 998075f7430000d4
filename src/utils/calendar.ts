/**
 * Calendar helpers.
 *
 * Dates are "YYYY-MM-DD" strings in the relay's configured time zone.
 * Do NOT use toISOString().slice(0, 10) for "today": that is the UTC date,
 * which is yesterday for evening runs west of Greenwich.
 */

const WEEKDAYS = ["Sun", "Mon", "Tue", "Wed", "Thu", "Fri", "Sat"];

/** en-CA formats as YYYY-MM-DD regardless of the host locale. */
export function localDate(now: Date, timeZone: string): string {
  return now.toLocaleDateString("en-CA", { timeZone });
}

/** 0 = Sunday ... 6 = Saturday, in the given time zone. */
export function localWeekday(now: Date, timeZone: string): number {
  const short = new Intl.DateTimeFormat("en-US", { weekday: "short", timeZone }).format(now);
  return WEEKDAYS.indexOf(short);
}

/** "Monday, October 19, 2026" */
export function longDate(now: Date, timeZone: string): string {
  return now.toLocaleDateString("en-US", {
    weekday: "long",
    year: "numeric",
    month: "long",
    day: "numeric",
    timeZone,
  });
}

export function isIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().startsWith(value);
}

/** Calendar arithmetic on a YYYY-MM-DD string. */
export function addDays(date: string, days: number): string {
  const parsed = new Date(`${date}T00:00:00Z`);
  parsed.setUTCDate(parsed.getUTCDate() + days);
  return parsed.toISOString().slice(0, 10);
}
