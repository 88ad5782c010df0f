export type TestEvent = {
  readonly uid: string;
  /** `YYYYMMDD` start date. */
  readonly date: string;
  readonly startTime?: string;
  readonly summary?: string;
  /** Regeneration stamp written into DTSTAMP, LAST-MODIFIED and CREATED. */
  readonly stamp?: string;
};

/** UTC date of `base` moved by `days`, as `YYYYMMDD`. */
export function dayKey(base: Date, days: number): string {
  const date = new Date(
    Date.UTC(base.getUTCFullYear(), base.getUTCMonth(), base.getUTCDate() + days),
  );
  return date.toISOString().slice(0, 10).replace(/-/g, "");
}

export function buildEvent(event: TestEvent): string {
  const stamp = event.stamp ?? "20260301T000000Z";
  return [
    "BEGIN:VEVENT",
    `UID:${event.uid}`,
    `DTSTAMP:${stamp}`,
    `CREATED:${stamp}`,
    `LAST-MODIFIED:${stamp}`,
    `DTSTART;TZID=UTC:${event.date}T${event.startTime ?? "0800"}00`,
    `SUMMARY:${event.summary ?? event.uid}`,
    "END:VEVENT",
  ].join("\r\n");
}

export function buildCalendar(events: ReadonlyArray<TestEvent>): string {
  return [
    "BEGIN:VCALENDAR",
    "VERSION:2.0",
    "PRODID:-//Test Roster//EN",
    ...events.map(buildEvent),
    "END:VCALENDAR",
  ].join("\r\n");
}
