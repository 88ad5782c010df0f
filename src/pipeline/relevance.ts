// pattern: Functional Core
import { addDays, formatDateKey, parseDateKey, toDateKey } from "./dates";
import type { DateKey, DayFingerprints, RelevanceResult } from "./types";

const ALL_START_DATES = /DTSTART[^:\r\n]*:(\d{8})/g;
const SUMMARY_DATE_LIMIT = 3;

export type RelevanceInput = {
  readonly body: string;
  readonly currentDays: DayFingerprints | null;
  readonly previousDays: DayFingerprints | null;
  readonly windowDays: number;
  readonly now: Date;
};

export function extractStartDates(body: string): Array<DateKey> {
  const dates = new Set<DateKey>();
  for (const match of body.matchAll(ALL_START_DATES)) {
    const key = match[1];
    if (key && parseDateKey(key)) dates.add(key);
  }
  return [...dates].sort();
}

/** Date keys whose day digest was added, removed or altered. */
export function changedDays(
  previous: DayFingerprints,
  current: DayFingerprints,
): Array<DateKey> {
  const keys = new Set([...Object.keys(previous), ...Object.keys(current)]);
  return [...keys].filter((key) => previous[key] !== current[key]).sort();
}

export function summarizeDates(dates: ReadonlyArray<DateKey>): string {
  const shown = dates.slice(0, SUMMARY_DATE_LIMIT).map(formatDateKey);
  return `Schedule changes for ${shown.join(", ")}`;
}

/**
 * Decides whether a changed feed touches anything inside the alert window
 * `[today, today + windowDays]`. With day digests on both sides only the
 * days that actually changed count; without them every start date in the
 * feed is a candidate.
 */
export function assessRelevance(input: RelevanceInput): RelevanceResult {
  const today = toDateKey(input.now);
  const lastDay = addDays(today, input.windowDays);

  const candidates =
    input.previousDays && input.currentDays
      ? changedDays(input.previousDays, input.currentDays)
      : extractStartDates(input.body);

  const dates = candidates.filter((key) => key >= today && key <= lastDay);

  if (dates.length === 0) {
    return { relevant: false };
  }

  return { relevant: true, dates, summary: summarizeDates(dates) };
}
