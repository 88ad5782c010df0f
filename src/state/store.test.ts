import { describe, it, expect, beforeEach } from "vitest";
import pino from "pino";
import { createTestDatabase } from "../test-utils/db";
import type { AppDatabase } from "../db";
import { settings } from "../db/schema";
import { EMPTY_REVISION_STATE } from "../pipeline/types";
import type { RevisionState } from "../pipeline/types";
import { createRevisionStateStore, REVISION_KEYS } from "./store";
import { readSettings, writeSetting } from "./settings";

const logger = pino({ level: "silent" });
const NOW = new Date("2026-03-10T12:00:00Z");

const pendingState: RevisionState = {
  hasPendingRevision: true,
  detectedAt: new Date("2026-03-10T09:00:00Z"),
  storedFingerprint: "fp-b",
  storedDayFingerprints: { "20260312": "day-b" },
  lastNotifiedFingerprint: "fp-b",
  lastNotificationAt: new Date("2026-03-10T09:00:00Z"),
};

describe("createRevisionStateStore", () => {
  let db: AppDatabase;

  beforeEach(() => {
    db = createTestDatabase();
  });

  it("should read the empty state from a fresh database", () => {
    const store = createRevisionStateStore(db, logger);

    expect(store.read()).toEqual(EMPTY_REVISION_STATE);
  });

  it("should read back what was saved", () => {
    const store = createRevisionStateStore(db, logger);

    store.save(pendingState);

    expect(store.read()).toEqual(pendingState);
  });

  it("should store values under readable keys", () => {
    const store = createRevisionStateStore(db, logger);

    store.save(pendingState);

    const values = readSettings(db, "roster.revision.");
    expect(values.get(REVISION_KEYS.pending)).toBe("true");
    expect(values.get(REVISION_KEYS.detectedAt)).toBe("2026-03-10T09:00:00.000Z");
    expect(values.get(REVISION_KEYS.fingerprint)).toBe("fp-b");
    expect(values.get(REVISION_KEYS.dayFingerprints)).toBe('{"20260312":"day-b"}');
  });

  it("should remove keys whose value becomes null", () => {
    const store = createRevisionStateStore(db, logger);
    store.save(pendingState);

    store.save({ ...pendingState, hasPendingRevision: false, detectedAt: null });

    const values = readSettings(db, "roster.revision.");
    expect(values.has(REVISION_KEYS.detectedAt)).toBe(false);
    expect(values.get(REVISION_KEYS.pending)).toBe("false");
  });

  it("should ignore unreadable timestamps and day digests", () => {
    writeSetting(db, REVISION_KEYS.lastNotificationAt, "yesterday");
    writeSetting(db, REVISION_KEYS.dayFingerprints, "{not json");

    const state = createRevisionStateStore(db, logger).read();

    expect(state.lastNotificationAt).toBeNull();
    expect(state.storedDayFingerprints).toBeNull();
  });

  it("should keep a fresh pending revision on load", () => {
    const store = createRevisionStateStore(db, logger);
    store.save(pendingState);

    const loaded = store.load(NOW);

    expect(loaded.reset).toBeNull();
    expect(loaded.effects).toEqual([]);
    expect(loaded.state).toEqual(pendingState);
  });

  it("should expire a stale pending revision on load and persist the reset", () => {
    const store = createRevisionStateStore(db, logger);
    store.save({ ...pendingState, detectedAt: new Date("2026-03-09T11:00:00Z") });

    const loaded = store.load(NOW);

    expect(loaded.reset).toBe("expired");
    expect(loaded.effects).toEqual([{ type: "retract" }]);
    expect(store.read().hasPendingRevision).toBe(false);
    expect(store.read().storedFingerprint).toBe("fp-b");
  });

  it("should reset a pending flag stored without a detection time", () => {
    writeSetting(db, REVISION_KEYS.pending, "true");
    writeSetting(db, REVISION_KEYS.fingerprint, "fp-b");
    const store = createRevisionStateStore(db, logger);

    const loaded = store.load(NOW);

    expect(loaded.reset).toBe("corrupt");
    expect(store.read()).toEqual({
      ...EMPTY_REVISION_STATE,
      storedFingerprint: "fp-b",
    });
  });

  it("should clear only revision keys", () => {
    writeSetting(db, "roster.policy.enabled", "true");
    const store = createRevisionStateStore(db, logger);
    store.save(pendingState);

    store.clear();

    expect(store.read()).toEqual(EMPTY_REVISION_STATE);
    expect(db.select().from(settings).all().map((row) => row.key)).toEqual([
      "roster.policy.enabled",
    ]);
  });
});
