// pattern: Functional Core
import type { AlertPolicy, QuietHours } from "../config";
import type { NotificationDecision, RevisionState } from "./types";

const HOUR_MS = 60 * 60 * 1000;

export type GateInput = {
  readonly state: RevisionState;
  readonly fingerprint: string;
  readonly policy: AlertPolicy;
  readonly now: Date;
  /** Local hour of day (0-23) used for the quiet-hours window. */
  readonly localHour: number;
};

export type GateResult = {
  readonly state: RevisionState;
  readonly decision: NotificationDecision;
};

/** `[startHour, endHour)`, wrapping past midnight when start > end. */
export function isWithinQuietHours(
  quietHours: QuietHours,
  localHour: number,
): boolean {
  const { startHour, endHour } = quietHours;
  if (startHour === endHour) return false;
  if (startHour < endHour) {
    return localHour >= startHour && localHour < endHour;
  }
  return localHour >= startHour || localHour < endHour;
}

function suppress(
  state: RevisionState,
  reason: NotificationDecision["reason"],
): GateResult {
  return { state, decision: { deliver: false, reason } };
}

/**
 * Decides whether a relevant revision is delivered. Rules are evaluated in
 * order and the first match wins:
 *
 * 1. pending and already notified for this fingerprint: suppress
 * 2. pending with a different fingerprint: superseding, skips the throttle
 * 3. not pending: mark pending as of `now`
 * 4. alerts disabled, then quiet hours, then (rule-3 path only) throttle
 * 5. otherwise deliver and record fingerprint and time
 *
 * The returned state always matches the returned decision; a delivery is
 * never reported without the fingerprint and time that record it.
 */
export function evaluateGate(input: GateInput): GateResult {
  const { state, fingerprint, policy, now, localHour } = input;

  if (state.hasPendingRevision && state.lastNotifiedFingerprint === fingerprint) {
    return suppress(state, "ALREADY_NOTIFIED_THIS_VERSION");
  }

  const superseding = state.hasPendingRevision;
  const pending: RevisionState = {
    ...state,
    hasPendingRevision: true,
    detectedAt: now,
  };

  if (!policy.enabled) {
    return suppress(pending, "NOTIFICATIONS_DISABLED");
  }

  if (
    policy.quietHours.enabled &&
    policy.quietHours.appliesToRevisions &&
    isWithinQuietHours(policy.quietHours, localHour)
  ) {
    return suppress(pending, "QUIET_HOURS");
  }

  if (
    !superseding &&
    state.lastNotificationAt !== null &&
    now.getTime() - state.lastNotificationAt.getTime() <
      policy.throttleHours * HOUR_MS
  ) {
    return suppress(pending, "THROTTLED");
  }

  return {
    state: {
      ...pending,
      lastNotifiedFingerprint: fingerprint,
      lastNotificationAt: now,
    },
    decision: {
      deliver: true,
      reason: superseding ? "SUPERSEDING_REVISION" : "NEW_REVISION",
    },
  };
}
