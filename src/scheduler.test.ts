import { describe, it, expect, beforeEach, vi } from "vitest";
import { EventEmitter } from "node:events";
import pino from "pino";
import cron from "node-cron";
import type { ScheduledTask } from "node-cron";
import {
  createFakeNotifier,
  createTestConfig,
  createTestDatabase,
} from "./test-utils/db";
import type { AppDatabase } from "./db";
import { CycleInProgressError, FeedFetchError, MissingCredentialsError } from "./errors";
import { performEffects, syncRevisionState } from "./pipeline/cycle";
import type { CycleReport, SyncedCycle } from "./pipeline/cycle";
import { writeAlertPolicy } from "./state/policy";
import { createRevisionScheduler, intervalToCron } from "./scheduler";
import type { RevisionSchedulerDeps } from "./scheduler";

vi.mock("node-cron");
vi.mock("./pipeline/cycle");

const logger = pino({ level: "silent" });
const credentials = { username: "crew", password: "test-secret" };

const processed: CycleReport = {
  status: "processed",
  fingerprint: "fp-a",
  outcome: { kind: "first_sync" },
};

const synced: SyncedCycle = { report: processed, effects: [] };

const withDelivery: SyncedCycle = {
  report: processed,
  effects: [
    {
      type: "deliver",
      fingerprint: "fp-a",
      summary: "Schedule changes for Mar 12",
      reason: "NEW_REVISION",
    },
  ],
};

type TickFn = (now: Date | "manual" | "init") => void;

function createTask(): ScheduledTask {
  return Object.assign(new EventEmitter(), {
    now: vi.fn(),
    start: vi.fn(),
    stop: vi.fn(),
  });
}

function deferred<T>() {
  let resolve: (value: T) => void = () => undefined;
  const promise = new Promise<T>((res) => {
    resolve = res;
  });
  return { promise, resolve };
}

describe("intervalToCron", () => {
  it("should map every allowed interval to a cron expression", () => {
    expect(intervalToCron(15)).toBe("*/15 * * * *");
    expect(intervalToCron(30)).toBe("*/30 * * * *");
    expect(intervalToCron(60)).toBe("0 * * * *");
    expect(intervalToCron(120)).toBe("0 */2 * * *");
    expect(intervalToCron(240)).toBe("0 */4 * * *");
  });
});

describe("createRevisionScheduler", () => {
  let db: AppDatabase;
  let ticks: Array<TickFn>;
  let tasks: Array<ScheduledTask>;

  function deps(overrides?: Partial<RevisionSchedulerDeps>): RevisionSchedulerDeps {
    return {
      db,
      config: createTestConfig(),
      logger,
      notifier: createFakeNotifier(),
      fetchFeed: vi.fn(),
      credentials,
      ...overrides,
    };
  }

  async function tick(index = 0): Promise<void> {
    const fn = ticks[index];
    if (!fn) throw new Error(`no tick registered at ${index}`);
    await fn(new Date());
  }

  beforeEach(() => {
    db = createTestDatabase();
    vi.clearAllMocks();
    ticks = [];
    tasks = [];

    vi.mocked(cron.schedule).mockImplementation((_expression, func) => {
      if (typeof func === "function") ticks.push(func);
      const task = createTask();
      tasks.push(task);
      return task;
    });
    vi.mocked(syncRevisionState).mockResolvedValue(synced);
    vi.mocked(performEffects).mockResolvedValue(undefined);
  });

  it("should schedule at the configured interval", () => {
    createRevisionScheduler(deps());

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith(
      "0 * * * *",
      expect.any(Function),
    );
  });

  it("should prefer the stored poll interval", () => {
    writeAlertPolicy(db, { ...createTestConfig().alerts, pollIntervalMinutes: 15 });

    const scheduler = createRevisionScheduler(deps());

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledWith(
      "*/15 * * * *",
      expect.any(Function),
    );
    expect(scheduler.intervalMinutes()).toBe(15);
  });

  it("should run a cycle on each tick", async () => {
    createRevisionScheduler(deps());

    await tick();

    expect(vi.mocked(syncRevisionState)).toHaveBeenCalledWith(
      expect.objectContaining({ db }),
      credentials,
    );
  });

  it("should perform the effects of a saved cycle", async () => {
    vi.mocked(syncRevisionState).mockResolvedValueOnce(withDelivery);
    createRevisionScheduler(deps());

    await tick();

    expect(vi.mocked(performEffects)).toHaveBeenCalledWith(
      expect.objectContaining({ db }),
      withDelivery.effects,
    );
  });

  it("should release the guard while an alert delivery hangs", async () => {
    vi.mocked(syncRevisionState).mockResolvedValueOnce(withDelivery);
    vi.mocked(performEffects).mockReturnValueOnce(new Promise<void>(() => undefined));
    const scheduler = createRevisionScheduler(deps());

    void tick();
    await vi.waitFor(() => {
      expect(vi.mocked(performEffects)).toHaveBeenCalledTimes(1);
    });

    expect(scheduler.isRunning()).toBe(false);
    await tick();
    expect(vi.mocked(syncRevisionState)).toHaveBeenCalledTimes(2);
    await expect(scheduler.runNow()).resolves.toEqual(processed);
  });

  it("should skip ticks without credentials", async () => {
    createRevisionScheduler(deps({ credentials: null }));

    await tick();

    expect(vi.mocked(syncRevisionState)).not.toHaveBeenCalled();
  });

  it("should drop a tick while a cycle is in flight", async () => {
    const pending = deferred<SyncedCycle>();
    vi.mocked(syncRevisionState).mockReturnValueOnce(pending.promise);
    const scheduler = createRevisionScheduler(deps());

    const first = tick();
    expect(scheduler.isRunning()).toBe(true);
    await tick();
    pending.resolve(synced);
    await first;

    expect(vi.mocked(syncRevisionState)).toHaveBeenCalledTimes(1);
    expect(scheduler.isRunning()).toBe(false);
  });

  it("should not let a failing cycle escape the tick", async () => {
    vi.mocked(syncRevisionState).mockRejectedValueOnce(new Error("disk I/O error"));
    const scheduler = createRevisionScheduler(deps());

    await expect(tick()).resolves.toBeUndefined();
    expect(scheduler.isRunning()).toBe(false);
  });

  it("should return the report from a manual run", async () => {
    const scheduler = createRevisionScheduler(deps());

    await expect(scheduler.runNow()).resolves.toEqual(processed);
  });

  it("should reject a manual run while a cycle is in flight", async () => {
    const pending = deferred<SyncedCycle>();
    vi.mocked(syncRevisionState).mockReturnValueOnce(pending.promise);
    const scheduler = createRevisionScheduler(deps());

    const first = tick();
    await expect(scheduler.runNow()).rejects.toBeInstanceOf(CycleInProgressError);
    pending.resolve(synced);
    await first;
  });

  it("should reject a manual run without credentials", async () => {
    const scheduler = createRevisionScheduler(deps({ credentials: null }));

    await expect(scheduler.runNow()).rejects.toBeInstanceOf(
      MissingCredentialsError,
    );
  });

  it("should surface fetch failures from a manual run", async () => {
    const error = new FeedFetchError("not_found", "roster URL not found", 404);
    vi.mocked(syncRevisionState).mockResolvedValueOnce({
      report: { status: "fetch_failed", error },
      effects: [],
    });
    const scheduler = createRevisionScheduler(deps());

    await expect(scheduler.runNow()).rejects.toBe(error);
  });

  it("should replace the timer on reschedule", () => {
    const scheduler = createRevisionScheduler(deps());

    scheduler.reschedule({ pollIntervalMinutes: 120, autoSync: true });

    expect(tasks[0]?.stop).toHaveBeenCalledTimes(1);
    expect(vi.mocked(cron.schedule)).toHaveBeenLastCalledWith(
      "0 */2 * * *",
      expect.any(Function),
    );
    expect(scheduler.intervalMinutes()).toBe(120);
  });

  it("should ignore a reschedule to the same settings or after stop", () => {
    const scheduler = createRevisionScheduler(deps());

    scheduler.reschedule({ pollIntervalMinutes: 60, autoSync: true });
    scheduler.stop();
    scheduler.reschedule({ pollIntervalMinutes: 240, autoSync: true });

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledTimes(1);
    expect(tasks[0]?.stop).toHaveBeenCalledTimes(1);
  });

  it("should not start a timer when automatic sync is off", async () => {
    writeAlertPolicy(db, { ...createTestConfig().alerts, autoSync: false });

    const scheduler = createRevisionScheduler(deps());

    expect(vi.mocked(cron.schedule)).not.toHaveBeenCalled();
    expect(scheduler.timerActive()).toBe(false);
    await expect(scheduler.runNow()).resolves.toEqual(processed);
  });

  it("should stop and restart the timer when automatic sync is toggled", () => {
    const scheduler = createRevisionScheduler(deps());

    scheduler.reschedule({ pollIntervalMinutes: 60, autoSync: false });

    expect(tasks[0]?.stop).toHaveBeenCalledTimes(1);
    expect(scheduler.timerActive()).toBe(false);

    scheduler.reschedule({ pollIntervalMinutes: 30, autoSync: true });

    expect(vi.mocked(cron.schedule)).toHaveBeenCalledTimes(2);
    expect(vi.mocked(cron.schedule)).toHaveBeenLastCalledWith(
      "*/30 * * * *",
      expect.any(Function),
    );
    expect(scheduler.timerActive()).toBe(true);
    expect(scheduler.intervalMinutes()).toBe(30);
  });
});
