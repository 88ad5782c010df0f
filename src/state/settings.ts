// pattern: Imperative Shell
import { eq, inArray, like } from "drizzle-orm";
import type { AppDatabase } from "../db";
import { settings } from "../db/schema";

export type SettingsWriter = Pick<AppDatabase, "insert" | "delete">;

export function readSettings(
  db: AppDatabase,
  prefix: string,
): Map<string, string> {
  const rows = db
    .select({ key: settings.key, value: settings.value })
    .from(settings)
    .where(like(settings.key, `${prefix}%`))
    .all();

  return new Map(rows.map((row) => [row.key, row.value]));
}

/** Upserts `value`, or removes the key when `value` is null. */
export function writeSetting(
  db: SettingsWriter,
  key: string,
  value: string | null,
): void {
  if (value === null) {
    db.delete(settings).where(eq(settings.key, key)).run();
    return;
  }

  const updatedAt = new Date();
  db.insert(settings)
    .values({ key, value, updatedAt })
    .onConflictDoUpdate({ target: settings.key, set: { value, updatedAt } })
    .run();
}

export function deleteSettings(
  db: SettingsWriter,
  keys: ReadonlyArray<string>,
): void {
  if (keys.length === 0) return;
  db.delete(settings).where(inArray(settings.key, [...keys])).run();
}
