import type { DateKey } from "./types";

const DATE_KEY_PATTERN = /^(\d{4})(\d{2})(\d{2})$/;

const shortDateFormat = new Intl.DateTimeFormat("en-US", {
  month: "short",
  day: "numeric",
  timeZone: "UTC",
});

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

export function toDateKey(date: Date): DateKey {
  return `${pad(date.getUTCFullYear(), 4)}${pad(date.getUTCMonth() + 1, 2)}${pad(date.getUTCDate(), 2)}`;
}

/**
 * Parses an eight-digit `YYYYMMDD` stamp into midnight UTC.
 * Impossible calendar dates (month 13, Feb 30) return null.
 */
export function parseDateKey(key: string): Date | null {
  const match = DATE_KEY_PATTERN.exec(key);
  if (!match) return null;

  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  const date = new Date(Date.UTC(year, month - 1, day));

  if (
    date.getUTCFullYear() !== year ||
    date.getUTCMonth() !== month - 1 ||
    date.getUTCDate() !== day
  ) {
    return null;
  }

  return date;
}

export function addDays(key: DateKey, days: number): DateKey {
  const date = parseDateKey(key);
  if (!date) {
    throw new Error(`invalid date key: ${key}`);
  }
  date.setUTCDate(date.getUTCDate() + days);
  return toDateKey(date);
}

/** `20260312` → `Mar 12` */
export function formatDateKey(key: DateKey): string {
  const date = parseDateKey(key);
  return date ? shortDateFormat.format(date) : key;
}

/**
 * Hour of day (0-23) at `now` in the given IANA zone, or in the process's
 * local zone when none is configured.
 */
export function localHourAt(now: Date, timeZone?: string): number {
  if (!timeZone) return now.getHours();

  const hour = new Intl.DateTimeFormat("en-US", {
    hour: "numeric",
    hourCycle: "h23",
    timeZone,
  })
    .formatToParts(now)
    .find((part) => part.type === "hour");

  return hour ? Number(hour.value) % 24 : now.getHours();
}
