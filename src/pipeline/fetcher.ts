import type { Logger } from "pino";
import { FeedFetchError } from "../errors";
import type { RawFeed } from "./types";

export const DEFAULT_FETCH_TIMEOUT_MS = 30_000;

const CALENDAR_MARKER = "BEGIN:VCALENDAR";

export type FeedCredentials = {
  readonly username: string;
  readonly password: string;
};

export type FetchFeedResult =
  | { readonly success: true; readonly feed: RawFeed }
  | { readonly success: false; readonly error: FeedFetchError };

export type FetchFeedFn = (
  url: string,
  credentials: FeedCredentials,
  logger: Logger,
  timeoutMs?: number,
) => Promise<FetchFeedResult>;

/** Calendar apps hand out `webcal://` links; they are plain HTTPS underneath. */
export function normalizeFeedUrl(url: string): string {
  const trimmed = url.trim();
  return /^webcal:\/\//i.test(trimmed)
    ? `https://${trimmed.slice("webcal://".length)}`
    : trimmed;
}

export function basicAuthHeader(credentials: FeedCredentials): string {
  const token = Buffer.from(
    `${credentials.username}:${credentials.password}`,
    "utf8",
  ).toString("base64");
  return `Basic ${token}`;
}

function classifyStatus(status: number, statusText: string): FeedFetchError {
  if (status === 401 || status === 403) {
    return new FeedFetchError(
      "unauthorized",
      status === 401 ? "invalid credentials" : "access denied",
      status,
    );
  }
  if (status === 404) {
    return new FeedFetchError("not_found", "roster URL not found", status);
  }
  if (status >= 500 && status <= 599) {
    return new FeedFetchError("server_error", `server error (${status})`, status);
  }
  return new FeedFetchError(
    "server_error",
    `HTTP ${status}: ${statusText}`,
    status,
  );
}

function classifyBody(body: string): FeedFetchError | null {
  if (body.length === 0) {
    return new FeedFetchError("malformed_content", "no data received", 200);
  }
  if (body.includes(CALENDAR_MARKER)) {
    return null;
  }
  if (body.includes("<!DOCTYPE html>") || body.includes("<html")) {
    return new FeedFetchError(
      "malformed_content",
      "received HTML instead of calendar data, check the roster URL",
      200,
    );
  }
  return new FeedFetchError(
    "malformed_content",
    "invalid calendar format, expected iCalendar data",
    200,
  );
}

/**
 * Downloads the roster calendar with HTTP Basic auth. Never throws: every
 * failure comes back as a categorised {@link FeedFetchError}.
 */
export const fetchRosterFeed: FetchFeedFn = async (
  url,
  credentials,
  logger,
  timeoutMs = DEFAULT_FETCH_TIMEOUT_MS,
) => {
  const target = normalizeFeedUrl(url);

  let response: Response;
  try {
    response = await fetch(target, {
      signal: AbortSignal.timeout(timeoutMs),
      headers: {
        Authorization: basicAuthHeader(credentials),
        Accept: "text/calendar",
        "User-Agent": "RosterWatch/1.0 (roster revision monitor)",
      },
    });
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url: target, error: message }, "roster fetch failed");
    return {
      success: false,
      error: new FeedFetchError("network_unavailable", message),
    };
  }

  if (response.status !== 200) {
    const error = classifyStatus(response.status, response.statusText);
    logger.warn(
      { url: target, status: response.status, kind: error.kind },
      "roster fetch rejected",
    );
    return { success: false, error };
  }

  let body: string;
  try {
    body = await response.text();
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    logger.warn({ url: target, error: message }, "roster body read failed");
    return {
      success: false,
      error: new FeedFetchError("network_unavailable", message),
    };
  }

  const invalid = classifyBody(body);
  if (invalid) {
    logger.warn(
      { url: target, preview: body.slice(0, 100) },
      "roster response is not a calendar",
    );
    return { success: false, error: invalid };
  }

  logger.info({ url: target, bytes: body.length }, "roster fetched");
  return { success: true, feed: { body, fetchedAt: new Date() } };
};
