import { createHash } from "node:crypto";
import type { CanonicalRecord, DayFingerprints } from "./types";

export function fingerprintText(text: string): string {
  return createHash("sha256").update(text, "utf8").digest("hex");
}

/**
 * Digest per start date, so a later revision can be narrowed down to the
 * days it touched without keeping the previous feed around.
 */
export function fingerprintDays(
  records: ReadonlyArray<CanonicalRecord>,
): DayFingerprints {
  const byDay = new Map<string, Array<string>>();
  for (const record of records) {
    const texts = byDay.get(record.dateKey) ?? [];
    texts.push(record.text);
    byDay.set(record.dateKey, texts);
  }

  const result: Record<string, string> = {};
  for (const [dateKey, texts] of [...byDay.entries()].sort(([a], [b]) =>
    a < b ? -1 : 1,
  )) {
    result[dateKey] = fingerprintText([...texts].sort().join("\n"));
  }
  return result;
}
