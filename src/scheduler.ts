// pattern: Imperative Shell
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import type { AlertPolicy } from "./config";
import { CycleInProgressError, MissingCredentialsError } from "./errors";
import { performEffects, syncRevisionState } from "./pipeline/cycle";
import type { CycleDeps, CycleReport } from "./pipeline/cycle";
import type { FeedCredentials } from "./pipeline/fetcher";
import { readAlertPolicy } from "./state/policy";
import type { PollTimerSettings } from "./state/policy";

export type PollInterval = AlertPolicy["pollIntervalMinutes"];

export type ProcessedReport = Extract<CycleReport, { status: "processed" }>;

export type RevisionScheduler = {
  readonly stop: () => void;
  /**
   * Replaces the running timer; the old one is stopped first. With
   * `autoSync` off no timer runs and only `runNow()` syncs.
   */
  readonly reschedule: (settings: PollTimerSettings) => void;
  /** Runs a cycle now and surfaces any failure to the caller. */
  readonly runNow: () => Promise<ProcessedReport>;
  readonly isRunning: () => boolean;
  readonly intervalMinutes: () => PollInterval;
  readonly timerActive: () => boolean;
};

export type RevisionSchedulerDeps = CycleDeps & {
  readonly credentials: FeedCredentials | null;
};

export function intervalToCron(minutes: PollInterval): string {
  if (minutes < 60) return `*/${minutes} * * * *`;
  if (minutes === 60) return "0 * * * *";
  return `0 */${minutes / 60} * * *`;
}

/**
 * Creates and starts the roster poll timer at the stored poll interval,
 * unless the stored policy turns automatic sync off.
 *
 * Only one cycle runs at a time. A timer tick that arrives while a cycle is
 * in flight is dropped, not queued; `runNow()` shares the same guard and
 * rejects instead. The guard covers fetch, evaluation and save; alert
 * delivery runs after it is released. Without credentials a tick does
 * nothing.
 *
 * @param deps - Database, config, logger, notifier, fetcher and credentials
 * @returns A RevisionScheduler controlling the timer and manual runs
 */
export function createRevisionScheduler(
  deps: RevisionSchedulerDeps,
): RevisionScheduler {
  const { logger } = deps;
  let inFlight = false;
  let stopped = false;

  const runGuarded = async (
    credentials: FeedCredentials,
  ): Promise<CycleReport> => {
    inFlight = true;
    const synced = await syncRevisionState(deps, credentials).finally(() => {
      inFlight = false;
    });

    await performEffects(deps, synced.effects);
    return synced.report;
  };

  const tick = async (): Promise<void> => {
    if (!deps.credentials) {
      logger.debug("roster poll skipped, no credentials");
      return;
    }
    if (inFlight) {
      logger.warn("roster poll skipped, previous cycle still running");
      return;
    }

    try {
      const report = await runGuarded(deps.credentials);
      if (report.status === "fetch_failed") {
        logger.warn(
          { kind: report.error.kind, error: report.error.message },
          "scheduled roster poll failed",
        );
      }
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      logger.error({ error: message }, "scheduled roster cycle failed unexpectedly");
    }
  };

  const schedule = (minutes: PollInterval): ScheduledTask =>
    cron.schedule(intervalToCron(minutes), tick);

  const policy = readAlertPolicy(deps.db, deps.config.alerts);
  let interval: PollInterval = policy.pollIntervalMinutes;
  let task: ScheduledTask | null = policy.autoSync ? schedule(interval) : null;
  if (task) {
    logger.info({ intervalMinutes: interval }, "roster poll timer started");
  } else {
    logger.info("automatic sync off, roster polls run only on request");
  }

  return {
    stop: () => {
      stopped = true;
      task?.stop();
    },

    reschedule: ({ pollIntervalMinutes, autoSync }) => {
      if (stopped) return;
      if (pollIntervalMinutes === interval && autoSync === (task !== null)) return;

      task?.stop();
      task = autoSync ? schedule(pollIntervalMinutes) : null;
      logger.info(
        { from: interval, to: pollIntervalMinutes, autoSync },
        "roster poll timer rescheduled",
      );
      interval = pollIntervalMinutes;
    },

    runNow: async () => {
      if (!deps.credentials) {
        throw new MissingCredentialsError();
      }
      if (inFlight) {
        throw new CycleInProgressError();
      }

      const report = await runGuarded(deps.credentials);
      if (report.status === "fetch_failed") {
        throw report.error;
      }
      return report;
    },

    isRunning: () => inFlight,
    intervalMinutes: () => interval,
    timerActive: () => task !== null,
  };
}
