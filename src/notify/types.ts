export type RevisionAlert = {
  readonly title: string;
  readonly body: string;
  /** Stable id; a fresh delivery replaces any earlier alert with the same id. */
  readonly identifier: string;
  readonly deepLink: {
    readonly action: "openPortal";
    readonly url: string;
  };
};

/**
 * Discriminated union result type for alert delivery.
 */
export type DeliveryResult =
  | { readonly success: true; readonly messageId: string }
  | { readonly success: false; readonly error: string };

/**
 * Channel that puts revision alerts in front of the user. Neither method
 * throws; delivery failures are returned in the result.
 */
export type Notifier = {
  readonly deliver: (alert: RevisionAlert) => Promise<DeliveryResult>;
  readonly retract: (identifier: string) => Promise<void>;
};
