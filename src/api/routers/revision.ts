// pattern: Imperative Shell
import { TRPCError } from "@trpc/server";
import { router, publicProcedure } from "../trpc";
import {
  CycleInProgressError,
  FeedFetchError,
  MissingCredentialsError,
} from "../../errors";
import type { FetchErrorKind } from "../../errors";
import {
  clearCachedData,
  confirmRevision,
  performEffects,
} from "../../pipeline/cycle";
import { createRevisionStateStore } from "../../state/store";
import { readAlertPolicy } from "../../state/policy";
import { readSyncStatus } from "../../state/sync";

type TrpcErrorCode = ConstructorParameters<typeof TRPCError>[0]["code"];

const FETCH_ERROR_CODES: Record<FetchErrorKind, TrpcErrorCode> = {
  unauthorized: "UNAUTHORIZED",
  not_found: "NOT_FOUND",
  server_error: "BAD_GATEWAY",
  malformed_content: "UNPROCESSABLE_CONTENT",
  network_unavailable: "SERVICE_UNAVAILABLE",
};

function toTrpcError(err: unknown): TRPCError {
  if (err instanceof FeedFetchError) {
    return new TRPCError({
      code: FETCH_ERROR_CODES[err.kind],
      message: err.message,
      cause: err,
    });
  }
  if (err instanceof CycleInProgressError) {
    return new TRPCError({ code: "CONFLICT", message: err.message, cause: err });
  }
  if (err instanceof MissingCredentialsError) {
    return new TRPCError({
      code: "PRECONDITION_FAILED",
      message: err.message,
      cause: err,
    });
  }
  const message = err instanceof Error ? err.message : String(err);
  return new TRPCError({ code: "INTERNAL_SERVER_ERROR", message, cause: err });
}

export const revisionRouter = router({
  status: publicProcedure.query(async ({ ctx }) => {
    const loaded = createRevisionStateStore(ctx.db, ctx.logger).load(new Date());
    await performEffects(ctx, loaded.effects);

    const state = loaded.state;
    const policy = readAlertPolicy(ctx.db, ctx.config.alerts);
    const sync = readSyncStatus(ctx.db);

    return {
      hasPendingRevision: state.hasPendingRevision,
      detectedAt: state.detectedAt,
      fingerprint: state.storedFingerprint,
      lastNotifiedFingerprint: state.lastNotifiedFingerprint,
      lastNotificationAt: state.lastNotificationAt,
      syncing: ctx.scheduler.isRunning(),
      pollIntervalMinutes: ctx.scheduler.intervalMinutes(),
      alertsEnabled: policy.enabled,
      autoSync: ctx.scheduler.timerActive(),
      lastAttemptAt: sync.lastAttemptAt,
      lastSuccessAt: sync.lastSuccessAt,
      lastError: sync.lastError,
    };
  }),

  confirm: publicProcedure.mutation(async ({ ctx }) => {
    await confirmRevision(ctx);
    return { confirmed: true };
  }),

  testConnection: publicProcedure.mutation(async ({ ctx }) => {
    try {
      const report = await ctx.scheduler.runNow();
      return {
        fingerprint: report.fingerprint,
        outcome: report.outcome.kind,
        decision:
          report.outcome.kind === "gated" ? report.outcome.decision : null,
      };
    } catch (err) {
      ctx.logger.warn(
        { error: err instanceof Error ? err.message : String(err) },
        "manual roster sync failed",
      );
      throw toTrpcError(err);
    }
  }),

  clearCache: publicProcedure.mutation(async ({ ctx }) => {
    await clearCachedData(ctx);
    return { cleared: true };
  }),
});
