import { vi } from "vitest";
import type { Mock } from "vitest";
import pino from "pino";
import { createDatabase, migrateDatabase } from "../db";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import { createCallerFactory } from "../api/trpc";
import { appRouter } from "../api/router";
import type { Notifier } from "../notify/types";
import type { RevisionScheduler } from "../scheduler";

/**
 * Creates an in-memory SQLite test database with all migrations applied.
 */
export function createTestDatabase(): AppDatabase {
  const { db } = createDatabase(":memory:");
  migrateDatabase(db, "./drizzle");
  return db;
}

/**
 * Creates a default AppConfig suitable for testing.
 */
export function createTestConfig(overrides?: Partial<AppConfig>): AppConfig {
  return {
    feed: {
      url: "https://roster.example.com/feed.ics",
      timeoutMs: 30_000,
    },
    alerts: {
      enabled: true,
      windowDays: 7,
      throttleHours: 12,
      pollIntervalMinutes: 60,
      autoSync: true,
      quietHours: {
        enabled: false,
        startHour: 22,
        endHour: 6,
        appliesToRevisions: true,
      },
    },
    notify: {
      recipient: "crew@example.com",
      portalUrl: "https://roster.example.com/revisions",
      timeZone: "UTC",
    },
    ...overrides,
  };
}

export type FakeNotifier = Notifier & {
  readonly deliver: Mock<Notifier["deliver"]>;
  readonly retract: Mock<Notifier["retract"]>;
};

export function createFakeNotifier(): FakeNotifier {
  let sequence = 0;
  return {
    deliver: vi.fn<Notifier["deliver"]>(async () => {
      sequence++;
      return { success: true, messageId: `msg-${sequence}` };
    }),
    retract: vi.fn<Notifier["retract"]>(async () => undefined),
  };
}

export function createFakeScheduler(
  overrides?: Partial<RevisionScheduler>,
): RevisionScheduler {
  return {
    stop: vi.fn(),
    reschedule: vi.fn(),
    runNow: vi.fn<RevisionScheduler["runNow"]>(async () => ({
      status: "processed",
      fingerprint: "0".repeat(64),
      outcome: { kind: "unchanged", autoCleared: false },
    })),
    isRunning: () => false,
    intervalMinutes: () => 60,
    timerActive: () => true,
    ...overrides,
  };
}

/**
 * Creates a typed tRPC caller with fake notifier and scheduler unless given.
 */
export function createTestCaller(
  db: AppDatabase,
  deps?: {
    readonly config?: AppConfig;
    readonly notifier?: Notifier;
    readonly scheduler?: RevisionScheduler;
  },
) {
  const createCaller = createCallerFactory(appRouter);
  const logger = pino({ level: "silent" });

  return createCaller({
    db,
    config: deps?.config ?? createTestConfig(),
    logger,
    notifier: deps?.notifier ?? createFakeNotifier(),
    scheduler: deps?.scheduler ?? createFakeScheduler(),
  });
}
