// pattern: Functional Core
import type { DayFingerprints, RevisionState, Transition } from "./types";

export const STABILITY_CLEAR_MS = 12 * 60 * 60 * 1000;

export type DetectionOutcome =
  | { readonly kind: "first_sync" }
  | { readonly kind: "unchanged"; readonly autoCleared: boolean }
  | {
      readonly kind: "changed";
      readonly previousDays: DayFingerprints | null;
    };

export type DetectionInput = {
  readonly state: RevisionState;
  readonly fingerprint: string;
  readonly dayFingerprints: DayFingerprints | null;
  readonly now: Date;
};

/**
 * Compares a fresh fingerprint with the stored one. The stored fingerprint
 * is always replaced by the fresh one, whatever happens downstream.
 *
 * A pending revision whose schedule has then stayed identical for more than
 * twelve hours is treated as settled and cleared. That equates "stable" with
 * "confirmed", which is not always true.
 */
export function detectRevision(
  input: DetectionInput,
): Transition<{ outcome: DetectionOutcome }> {
  const { state, fingerprint, dayFingerprints, now } = input;
  const refreshed: RevisionState = {
    ...state,
    storedFingerprint: fingerprint,
    storedDayFingerprints: dayFingerprints,
  };

  if (state.storedFingerprint === null) {
    return { state: refreshed, effects: [], outcome: { kind: "first_sync" } };
  }

  if (state.storedFingerprint !== fingerprint) {
    return {
      state: refreshed,
      effects: [],
      outcome: {
        kind: "changed",
        previousDays: state.storedDayFingerprints,
      },
    };
  }

  if (
    state.hasPendingRevision &&
    state.detectedAt !== null &&
    now.getTime() - state.detectedAt.getTime() > STABILITY_CLEAR_MS
  ) {
    return {
      state: { ...refreshed, hasPendingRevision: false, detectedAt: null },
      effects: [{ type: "retract" }],
      outcome: { kind: "unchanged", autoCleared: true },
    };
  }

  return {
    state: refreshed,
    effects: [],
    outcome: { kind: "unchanged", autoCleared: false },
  };
}
