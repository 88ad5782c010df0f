export const FETCH_ERROR_KINDS = [
  "unauthorized",
  "not_found",
  "server_error",
  "malformed_content",
  "network_unavailable",
] as const;

export type FetchErrorKind = (typeof FETCH_ERROR_KINDS)[number];

/** A feed download that did not yield calendar text. */
export class FeedFetchError extends Error {
  readonly kind: FetchErrorKind;
  readonly status: number | null;

  constructor(kind: FetchErrorKind, message: string, status: number | null = null) {
    super(message);
    this.name = "FeedFetchError";
    this.kind = kind;
    this.status = status;
  }
}

export class CycleInProgressError extends Error {
  constructor() {
    super("a roster sync is already in progress");
    this.name = "CycleInProgressError";
  }
}

export class MissingCredentialsError extends Error {
  constructor() {
    super("roster feed credentials are not configured");
    this.name = "MissingCredentialsError";
  }
}
