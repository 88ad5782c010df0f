// pattern: Functional Core
import { parseDateKey, toDateKey } from "./dates";
import type { CanonicalFeed, CanonicalRecord } from "./types";

const EVENT_BLOCK = /BEGIN:VEVENT[\s\S]*?END:VEVENT/g;
const EVENT_START_MARKER = /BEGIN:VEVENT/g;
const START_DATE = /DTSTART[^:\r\n]*:(\d{8})/;

// Stamps the upstream generator rewrites on every export.
const VOLATILE_FIELDS: ReadonlyArray<RegExp> = [
  /^DTSTAMP[;:]/,
  /^LAST-MODIFIED[;:]/,
  /^CREATED[;:]/,
];

export function extractStartDateKey(record: string): string | null {
  const match = START_DATE.exec(record);
  if (!match?.[1]) return null;
  return parseDateKey(match[1]) ? match[1] : null;
}

export function stripVolatileFields(record: string): string {
  return record
    .split(/\r?\n/)
    .filter((line) => !VOLATILE_FIELDS.some((pattern) => pattern.test(line)))
    .join("\n");
}

/**
 * Reduces a calendar feed to the events that start today (UTC) or later,
 * minus regeneration stamps, in a stable order. Two exports of the same
 * upcoming schedule produce identical text.
 *
 * When the body holds an unterminated event block it cannot be split
 * reliably, so the whole body is used verbatim instead.
 */
export function canonicalizeFeed(body: string, now: Date): CanonicalFeed {
  const blocks = body.match(EVENT_BLOCK) ?? [];
  const startMarkers = body.match(EVENT_START_MARKER)?.length ?? 0;

  if (startMarkers !== blocks.length) {
    return {
      mode: "verbatim",
      text: body,
      reason: `found ${startMarkers} event start markers but ${blocks.length} complete events`,
    };
  }

  const today = toDateKey(now);
  const records: Array<CanonicalRecord> = [];
  let droppedCount = 0;

  for (const block of blocks) {
    const dateKey = extractStartDateKey(block);
    if (!dateKey || dateKey < today) {
      droppedCount++;
      continue;
    }
    records.push({ dateKey, text: stripVolatileFields(block) });
  }

  records.sort((a, b) => (a.text < b.text ? -1 : a.text > b.text ? 1 : 0));

  return {
    mode: "records",
    text: records.map((record) => record.text).join("\n"),
    records,
    droppedCount,
  };
}
