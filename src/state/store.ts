// pattern: Imperative Shell
import type { Logger } from "pino";
import { z } from "zod";
import type { AppDatabase } from "../db";
import { sweepRevisionState } from "../pipeline/expiry";
import type { SweepReset } from "../pipeline/expiry";
import type { DayFingerprints, RevisionEffect, RevisionState } from "../pipeline/types";
import { deleteSettings, readSettings, writeSetting } from "./settings";

export const REVISION_KEY_PREFIX = "roster.revision.";

export const REVISION_KEYS = {
  pending: `${REVISION_KEY_PREFIX}pending`,
  detectedAt: `${REVISION_KEY_PREFIX}detectedAt`,
  fingerprint: `${REVISION_KEY_PREFIX}fingerprint`,
  dayFingerprints: `${REVISION_KEY_PREFIX}dayFingerprints`,
  lastNotifiedFingerprint: `${REVISION_KEY_PREFIX}lastNotifiedFingerprint`,
  lastNotificationAt: `${REVISION_KEY_PREFIX}lastNotificationAt`,
} as const;

const dayFingerprintsSchema = z.record(z.string().regex(/^\d{8}$/), z.string());

export type LoadedRevisionState = {
  readonly state: RevisionState;
  readonly effects: ReadonlyArray<RevisionEffect>;
  readonly reset: SweepReset;
};

export type RevisionStateStore = {
  /** Stored values as-is, without the expiry sweep. */
  readonly read: () => RevisionState;
  /** Reads, sweeps expired or corrupt pending flags, and writes back any reset. */
  readonly load: (now: Date) => LoadedRevisionState;
  readonly save: (state: RevisionState) => void;
  readonly clear: () => void;
};

function parseTimestamp(value: string | undefined): Date | null {
  if (value === undefined) return null;
  const date = new Date(value);
  return Number.isNaN(date.getTime()) ? null : date;
}

function parseDayFingerprints(value: string | undefined): DayFingerprints | null {
  if (value === undefined) return null;
  try {
    const result = dayFingerprintsSchema.safeParse(JSON.parse(value));
    return result.success ? result.data : null;
  } catch {
    return null;
  }
}

export function createRevisionStateStore(
  db: AppDatabase,
  logger: Logger,
): RevisionStateStore {
  const read = (): RevisionState => {
    const values = readSettings(db, REVISION_KEY_PREFIX);
    return {
      hasPendingRevision: values.get(REVISION_KEYS.pending) === "true",
      detectedAt: parseTimestamp(values.get(REVISION_KEYS.detectedAt)),
      storedFingerprint: values.get(REVISION_KEYS.fingerprint) ?? null,
      storedDayFingerprints: parseDayFingerprints(
        values.get(REVISION_KEYS.dayFingerprints),
      ),
      lastNotifiedFingerprint:
        values.get(REVISION_KEYS.lastNotifiedFingerprint) ?? null,
      lastNotificationAt: parseTimestamp(
        values.get(REVISION_KEYS.lastNotificationAt),
      ),
    };
  };

  const save = (state: RevisionState): void => {
    db.transaction((tx) => {
      writeSetting(tx, REVISION_KEYS.pending, String(state.hasPendingRevision));
      writeSetting(
        tx,
        REVISION_KEYS.detectedAt,
        state.detectedAt?.toISOString() ?? null,
      );
      writeSetting(tx, REVISION_KEYS.fingerprint, state.storedFingerprint);
      writeSetting(
        tx,
        REVISION_KEYS.dayFingerprints,
        state.storedDayFingerprints
          ? JSON.stringify(state.storedDayFingerprints)
          : null,
      );
      writeSetting(
        tx,
        REVISION_KEYS.lastNotifiedFingerprint,
        state.lastNotifiedFingerprint,
      );
      writeSetting(
        tx,
        REVISION_KEYS.lastNotificationAt,
        state.lastNotificationAt?.toISOString() ?? null,
      );
    });
  };

  const load = (now: Date): LoadedRevisionState => {
    const swept = sweepRevisionState(read(), now);

    if (swept.reset === "corrupt") {
      logger.warn("pending revision had no detection time, state reset");
      save(swept.state);
    } else if (swept.reset === "expired") {
      logger.info("pending revision older than 24h, auto-cleared");
      save(swept.state);
    }

    return swept;
  };

  const clear = (): void => {
    deleteSettings(db, Object.values(REVISION_KEYS));
  };

  return { read, load, save, clear };
}
