export type RawFeed = {
  readonly body: string;
  readonly fetchedAt: Date;
};

/** UTC calendar date in `YYYYMMDD` form. Sorts the same as the dates it names. */
export type DateKey = string;

export type CanonicalRecord = {
  readonly dateKey: DateKey;
  readonly text: string;
};

export type CanonicalFeed =
  | {
      readonly mode: "records";
      readonly text: string;
      readonly records: ReadonlyArray<CanonicalRecord>;
      readonly droppedCount: number;
    }
  | {
      readonly mode: "verbatim";
      readonly text: string;
      readonly reason: string;
    };

export type DayFingerprints = Readonly<Record<DateKey, string>>;

export type RevisionState = {
  readonly hasPendingRevision: boolean;
  readonly detectedAt: Date | null;
  readonly storedFingerprint: string | null;
  readonly storedDayFingerprints: DayFingerprints | null;
  readonly lastNotifiedFingerprint: string | null;
  readonly lastNotificationAt: Date | null;
};

export const EMPTY_REVISION_STATE: RevisionState = {
  hasPendingRevision: false,
  detectedAt: null,
  storedFingerprint: null,
  storedDayFingerprints: null,
  lastNotifiedFingerprint: null,
  lastNotificationAt: null,
};

export type DecisionReason =
  | "NEW_REVISION"
  | "SUPERSEDING_REVISION"
  | "ALREADY_NOTIFIED_THIS_VERSION"
  | "NOTIFICATIONS_DISABLED"
  | "QUIET_HOURS"
  | "THROTTLED";

export type NotificationDecision = {
  readonly deliver: boolean;
  readonly reason: DecisionReason;
};

export type RelevantRevision = {
  readonly relevant: true;
  readonly dates: ReadonlyArray<DateKey>;
  readonly summary: string;
};

export type RelevanceResult = RelevantRevision | { readonly relevant: false };

/**
 * Side effects a pure transition asks its caller to perform once the
 * resulting state has been persisted.
 */
export type RevisionEffect =
  | {
      readonly type: "deliver";
      readonly fingerprint: string;
      readonly summary: string;
      readonly reason: DecisionReason;
    }
  | { readonly type: "retract" };

export type Transition<TExtra = object> = {
  readonly state: RevisionState;
  readonly effects: ReadonlyArray<RevisionEffect>;
} & TExtra;

export const REVISION_ALERT_ID = "roster-revision";
