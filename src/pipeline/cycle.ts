// pattern: Imperative Shell
import type { Logger } from "pino";
import type { AppConfig } from "../config";
import type { AppDatabase } from "../db";
import type { FeedFetchError } from "../errors";
import { buildRevisionAlert } from "../notify/message";
import type { Notifier } from "../notify/types";
import { readAlertPolicy } from "../state/policy";
import { createRevisionStateStore } from "../state/store";
import { recordSyncResult } from "../state/sync";
import { localHourAt } from "./dates";
import { evaluateFeed } from "./evaluate";
import type { EvaluationOutcome } from "./evaluate";
import { confirmPendingRevision } from "./expiry";
import type { FeedCredentials, FetchFeedFn } from "./fetcher";
import { REVISION_ALERT_ID } from "./types";
import type { RevisionEffect } from "./types";

export type CycleDeps = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly notifier: Notifier;
  readonly fetchFeed: FetchFeedFn;
  readonly clock?: () => Date;
};

export type CycleReport =
  | { readonly status: "fetch_failed"; readonly error: FeedFetchError }
  | {
      readonly status: "processed";
      readonly fingerprint: string;
      readonly outcome: EvaluationOutcome;
    };

/** A cycle whose state is saved but whose effects have not run yet. */
export type SyncedCycle = {
  readonly report: CycleReport;
  readonly effects: ReadonlyArray<RevisionEffect>;
};

function now(deps: Pick<CycleDeps, "clock">): Date {
  return deps.clock ? deps.clock() : new Date();
}

/**
 * Performs effects returned by a pure transition. Must only be called after
 * the matching state has been saved.
 *
 * A delivery is dropped when the stored state no longer holds its revision
 * as pending and notified, which happens when the revision was confirmed or
 * cleared after the save.
 */
export async function performEffects(
  deps: Pick<CycleDeps, "db" | "config" | "logger" | "notifier">,
  effects: ReadonlyArray<RevisionEffect>,
): Promise<void> {
  for (const effect of effects) {
    if (effect.type === "retract") {
      await deps.notifier.retract(REVISION_ALERT_ID);
      continue;
    }

    const current = createRevisionStateStore(deps.db, deps.logger).read();
    if (
      !current.hasPendingRevision ||
      current.lastNotifiedFingerprint !== effect.fingerprint
    ) {
      deps.logger.info(
        { reason: effect.reason, fingerprint: effect.fingerprint.slice(0, 16) },
        "revision alert skipped, revision no longer pending",
      );
      continue;
    }

    const alert = buildRevisionAlert(effect.summary, deps.config.notify.portalUrl);
    const result = await deps.notifier.deliver(alert);
    if (result.success) {
      deps.logger.info(
        { reason: effect.reason, messageId: result.messageId },
        "revision alert delivered",
      );
    } else {
      // State already records this fingerprint as notified; the next cycle
      // will not retry.
      deps.logger.error(
        { reason: effect.reason, error: result.error },
        "revision alert delivery failed",
      );
    }
  }
}

/**
 * Fetches the feed, records the sync result, then evaluates and saves the
 * revision state. The effects come back unperformed.
 *
 * Everything after the fetch up to `save` is synchronous, so no other writer
 * can interleave between reading and writing the revision state.
 */
export async function syncRevisionState(
  deps: CycleDeps,
  credentials: FeedCredentials,
): Promise<SyncedCycle> {
  const { db, config, logger } = deps;
  const attemptedAt = now(deps);

  const fetched = await deps.fetchFeed(
    config.feed.url,
    credentials,
    logger,
    config.feed.timeoutMs,
  );

  if (!fetched.success) {
    recordSyncResult(db, attemptedAt, { success: false, error: fetched.error });
    return {
      report: { status: "fetch_failed", error: fetched.error },
      effects: [],
    };
  }

  const at = now(deps);
  const store = createRevisionStateStore(db, logger);
  const policy = readAlertPolicy(db, config.alerts);
  const loaded = store.load(at);

  const evaluation = evaluateFeed({
    state: loaded.state,
    feed: fetched.feed,
    policy,
    now: at,
    localHour: localHourAt(at, config.notify.timeZone),
  });

  store.save(evaluation.state);
  recordSyncResult(db, attemptedAt, {
    success: true,
    fetchedAt: fetched.feed.fetchedAt,
  });

  if (evaluation.canonical.mode === "verbatim") {
    logger.warn(
      { reason: evaluation.canonical.reason },
      "feed could not be split into events, fingerprinting whole body",
    );
  }

  logger.info(
    {
      fetchedAt: fetched.feed.fetchedAt.toISOString(),
      outcome: evaluation.outcome.kind,
      fingerprint: evaluation.fingerprint.slice(0, 16),
      decision:
        evaluation.outcome.kind === "gated"
          ? evaluation.outcome.decision.reason
          : null,
      pending: evaluation.state.hasPendingRevision,
    },
    "roster revision cycle evaluated",
  );

  return {
    report: {
      status: "processed",
      fingerprint: evaluation.fingerprint,
      outcome: evaluation.outcome,
    },
    effects: [...loaded.effects, ...evaluation.effects],
  };
}

/** Runs one fetch → evaluate → persist → notify cycle. */
export async function runRevisionCycle(
  deps: CycleDeps,
  credentials: FeedCredentials,
): Promise<CycleReport> {
  const synced = await syncRevisionState(deps, credentials);
  await performEffects(deps, synced.effects);
  return synced.report;
}

/** Acknowledges the pending revision and withdraws its alert. */
export async function confirmRevision(
  deps: Omit<CycleDeps, "fetchFeed">,
): Promise<void> {
  const store = createRevisionStateStore(deps.db, deps.logger);
  const { state } = store.load(now(deps));
  const transition = confirmPendingRevision(state);

  store.save(transition.state);
  deps.logger.info("revision marked as confirmed");

  await performEffects(deps, transition.effects);
}

/** Forgets every stored fingerprint and pending flag. Policy is kept. */
export async function clearCachedData(
  deps: Omit<CycleDeps, "fetchFeed">,
): Promise<void> {
  createRevisionStateStore(deps.db, deps.logger).clear();
  deps.logger.info("cached roster revision data cleared");

  await deps.notifier.retract(REVISION_ALERT_ID);
}
