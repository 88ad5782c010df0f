import { describe, it, expect, beforeEach, vi } from "vitest";
import { TRPCError } from "@trpc/server";
import pino from "pino";
import {
  createFakeNotifier,
  createFakeScheduler,
  createTestCaller,
  createTestDatabase,
} from "../../test-utils/db";
import type { AppDatabase } from "../../db";
import {
  CycleInProgressError,
  FeedFetchError,
  MissingCredentialsError,
} from "../../errors";
import { createRevisionStateStore } from "../../state/store";
import { recordSyncResult } from "../../state/sync";
import type { RevisionState } from "../../pipeline/types";

const logger = pino({ level: "silent" });

const pendingState: RevisionState = {
  hasPendingRevision: true,
  detectedAt: new Date(Date.now() - 60 * 60 * 1000),
  storedFingerprint: "fp-b",
  storedDayFingerprints: { "20260312": "day-b" },
  lastNotifiedFingerprint: "fp-b",
  lastNotificationAt: new Date(Date.now() - 60 * 60 * 1000),
};

describe("revision router", () => {
  let db: AppDatabase;

  beforeEach(() => {
    db = createTestDatabase();
  });

  describe("status", () => {
    it("should report an empty state before the first sync", async () => {
      const caller = createTestCaller(db);

      const status = await caller.revision.status();

      expect(status).toEqual({
        hasPendingRevision: false,
        detectedAt: null,
        fingerprint: null,
        lastNotifiedFingerprint: null,
        lastNotificationAt: null,
        syncing: false,
        pollIntervalMinutes: 60,
        alertsEnabled: true,
        autoSync: true,
        lastAttemptAt: null,
        lastSuccessAt: null,
        lastError: null,
      });
    });

    it("should report a pending revision and a running sync", async () => {
      createRevisionStateStore(db, logger).save(pendingState);
      const caller = createTestCaller(db, {
        scheduler: createFakeScheduler({ isRunning: () => true }),
      });

      const status = await caller.revision.status();

      expect(status.hasPendingRevision).toBe(true);
      expect(status.fingerprint).toBe("fp-b");
      expect(status.detectedAt).toEqual(pendingState.detectedAt);
      expect(status.syncing).toBe(true);
    });

    it("should clear a revision pending for more than 24 hours and withdraw its alert", async () => {
      createRevisionStateStore(db, logger).save({
        ...pendingState,
        detectedAt: new Date(Date.now() - 25 * 60 * 60 * 1000),
      });
      const notifier = createFakeNotifier();
      const caller = createTestCaller(db, { notifier });

      const status = await caller.revision.status();

      expect(status.hasPendingRevision).toBe(false);
      expect(status.detectedAt).toBeNull();
      expect(notifier.retract).toHaveBeenCalledWith("roster-revision");
      expect(createRevisionStateStore(db, logger).read().hasPendingRevision).toBe(
        false,
      );
    });

    it("should report the last sync attempt and its failure", async () => {
      const attemptedAt = new Date("2026-03-10T12:00:00Z");
      recordSyncResult(db, new Date("2026-03-10T11:00:00Z"), {
        success: true,
        fetchedAt: new Date("2026-03-10T11:00:01Z"),
      });
      recordSyncResult(db, attemptedAt, {
        success: false,
        error: new FeedFetchError("unauthorized", "invalid credentials", 401),
      });
      const caller = createTestCaller(db, {
        scheduler: createFakeScheduler({ timerActive: () => false }),
      });

      const status = await caller.revision.status();

      expect(status.lastAttemptAt).toEqual(attemptedAt);
      expect(status.lastSuccessAt).toEqual(new Date("2026-03-10T11:00:01Z"));
      expect(status.lastError).toEqual({
        kind: "unauthorized",
        message: "invalid credentials",
      });
      expect(status.autoSync).toBe(false);
    });
  });

  describe("confirm", () => {
    it("should clear the pending revision and withdraw the alert", async () => {
      createRevisionStateStore(db, logger).save(pendingState);
      const notifier = createFakeNotifier();
      const caller = createTestCaller(db, { notifier });

      const result = await caller.revision.confirm();

      expect(result).toEqual({ confirmed: true });
      expect(createRevisionStateStore(db, logger).read().hasPendingRevision).toBe(
        false,
      );
      expect(notifier.retract).toHaveBeenCalledWith("roster-revision");
    });
  });

  describe("testConnection", () => {
    it("should return the outcome of a manual sync", async () => {
      const caller = createTestCaller(db, {
        scheduler: createFakeScheduler({
          runNow: vi.fn(async () => ({
            status: "processed" as const,
            fingerprint: "fp-c",
            outcome: {
              kind: "gated" as const,
              relevance: {
                relevant: true as const,
                dates: ["20260312"],
                summary: "Schedule changes for Mar 12",
              },
              decision: { deliver: true, reason: "NEW_REVISION" as const },
            },
          })),
        }),
      });

      const result = await caller.revision.testConnection();

      expect(result).toEqual({
        fingerprint: "fp-c",
        outcome: "gated",
        decision: { deliver: true, reason: "NEW_REVISION" },
      });
    });

    it.each([
      [new FeedFetchError("unauthorized", "invalid credentials", 401), "UNAUTHORIZED"],
      [new FeedFetchError("not_found", "roster URL not found", 404), "NOT_FOUND"],
      [new FeedFetchError("server_error", "server error (502)", 502), "BAD_GATEWAY"],
      [
        new FeedFetchError("malformed_content", "no data received", 200),
        "UNPROCESSABLE_CONTENT",
      ],
      [new FeedFetchError("network_unavailable", "offline"), "SERVICE_UNAVAILABLE"],
      [new CycleInProgressError(), "CONFLICT"],
      [new MissingCredentialsError(), "PRECONDITION_FAILED"],
      [new Error("disk full"), "INTERNAL_SERVER_ERROR"],
    ])("should map %s to %s", async (error, code) => {
      const caller = createTestCaller(db, {
        scheduler: createFakeScheduler({
          runNow: vi.fn(async () => {
            throw error;
          }),
        }),
      });

      const result = caller.revision.testConnection();

      await expect(result).rejects.toBeInstanceOf(TRPCError);
      await expect(result).rejects.toMatchObject({ code, message: error.message });
    });
  });

  describe("clearCache", () => {
    it("should forget stored fingerprints", async () => {
      createRevisionStateStore(db, logger).save(pendingState);
      const caller = createTestCaller(db);

      const result = await caller.revision.clearCache();

      expect(result).toEqual({ cleared: true });
      expect(createRevisionStateStore(db, logger).read().storedFingerprint).toBeNull();
    });
  });
});
