// pattern: Imperative Shell
import { z } from "zod";
import type { AppDatabase } from "../db";
import { FETCH_ERROR_KINDS } from "../errors";
import type { FeedFetchError, FetchErrorKind } from "../errors";
import { readSettings, writeSetting } from "./settings";

export const SYNC_KEY_PREFIX = "roster.sync.";

export const SYNC_KEYS = {
  lastAttemptAt: `${SYNC_KEY_PREFIX}lastAttemptAt`,
  lastSuccessAt: `${SYNC_KEY_PREFIX}lastSuccessAt`,
  lastError: `${SYNC_KEY_PREFIX}lastError`,
} as const;

const syncErrorSchema = z.object({
  kind: z.enum(FETCH_ERROR_KINDS),
  message: z.string(),
});

export type SyncError = {
  readonly kind: FetchErrorKind;
  readonly message: string;
};

export type SyncStatus = {
  readonly lastAttemptAt: Date | null;
  readonly lastSuccessAt: Date | null;
  /** Set by a failed fetch, cleared by the next successful one. */
  readonly lastError: SyncError | null;
};

export type SyncResult =
  | { readonly success: true; readonly fetchedAt: Date }
  | { readonly success: false; readonly error: FeedFetchError };

function parseTimestamp(value: string | undefined): Date | null {
  if (value === undefined) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseError(value: string | undefined): SyncError | null {
  if (value === undefined) return null;
  try {
    const result = syncErrorSchema.safeParse(JSON.parse(value));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export function readSyncStatus(db: AppDatabase): SyncStatus {
  const values = readSettings(db, SYNC_KEY_PREFIX);
  return {
    lastAttemptAt: parseTimestamp(values.get(SYNC_KEYS.lastAttemptAt)),
    lastSuccessAt: parseTimestamp(values.get(SYNC_KEYS.lastSuccessAt)),
    lastError: parseError(values.get(SYNC_KEYS.lastError)),
  };
}

/**
 * Records the outcome of one fetch. A failure keeps the previous
 * `lastSuccessAt`, so readers can tell how long the feed has been failing.
 */
export function recordSyncResult(
  db: AppDatabase,
  attemptedAt: Date,
  result: SyncResult,
): void {
  db.transaction((tx) => {
    writeSetting(tx, SYNC_KEYS.lastAttemptAt, attemptedAt.toISOString());
    if (result.success) {
      writeSetting(tx, SYNC_KEYS.lastSuccessAt, result.fetchedAt.toISOString());
      writeSetting(tx, SYNC_KEYS.lastError, null);
    } else {
      writeSetting(
        tx,
        SYNC_KEYS.lastError,
        JSON.stringify({ kind: result.error.kind, message: result.error.message }),
      );
    }
  });
}
