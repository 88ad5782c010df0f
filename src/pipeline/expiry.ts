// pattern: Functional Core
import type { RevisionState, Transition } from "./types";

export const PENDING_EXPIRY_MS = 24 * 60 * 60 * 1000;

export type SweepReset = "corrupt" | "expired" | null;

function clearPending(state: RevisionState): RevisionState {
  return { ...state, hasPendingRevision: false, detectedAt: null };
}

/**
 * Runs whenever state is loaded. A pending flag without a detection time is
 * corrupt and is reset; a pending revision older than 24 hours is dropped and
 * its alert withdrawn. Fingerprints are left alone in both cases.
 */
export function sweepRevisionState(
  state: RevisionState,
  now: Date,
): Transition<{ reset: SweepReset }> {
  if (!state.hasPendingRevision) {
    return { state, effects: [], reset: null };
  }

  if (state.detectedAt === null) {
    return {
      state: clearPending(state),
      effects: [{ type: "retract" }],
      reset: "corrupt",
    };
  }

  if (now.getTime() - state.detectedAt.getTime() > PENDING_EXPIRY_MS) {
    return {
      state: clearPending(state),
      effects: [{ type: "retract" }],
      reset: "expired",
    };
  }

  return { state, effects: [], reset: null };
}

/** User acknowledgement: the pending revision has been seen and confirmed. */
export function confirmPendingRevision(state: RevisionState): Transition {
  return { state: clearPending(state), effects: [{ type: "retract" }] };
}
