// pattern: Imperative Shell
import type { z } from "zod";
import { alertPolicySchema, quietHoursSchema } from "../config/schema";
import type { AlertPolicy } from "../config";
import type { AppDatabase } from "../db";
import { readSettings, writeSetting } from "./settings";

export const POLICY_KEY_PREFIX = "roster.policy.";

export const POLICY_KEYS = {
  enabled: `${POLICY_KEY_PREFIX}enabled`,
  windowDays: `${POLICY_KEY_PREFIX}windowDays`,
  throttleHours: `${POLICY_KEY_PREFIX}throttleHours`,
  pollIntervalMinutes: `${POLICY_KEY_PREFIX}pollIntervalMinutes`,
  autoSync: `${POLICY_KEY_PREFIX}autoSync`,
  quietHoursEnabled: `${POLICY_KEY_PREFIX}quietHours.enabled`,
  quietHoursStartHour: `${POLICY_KEY_PREFIX}quietHours.startHour`,
  quietHoursEndHour: `${POLICY_KEY_PREFIX}quietHours.endHour`,
  quietHoursAppliesToRevisions: `${POLICY_KEY_PREFIX}quietHours.appliesToRevisions`,
} as const;

export type AlertPolicyPatch = Partial<Omit<AlertPolicy, "quietHours">> & {
  readonly quietHours?: Partial<AlertPolicy["quietHours"]>;
};

export type PollTimerSettings = Pick<AlertPolicy, "pollIntervalMinutes" | "autoSync">;

export type PolicyEffect = { readonly type: "reschedule" } & PollTimerSettings;

function decode(value: string | undefined): unknown {
  if (value === undefined) return undefined;
  try {
    return JSON.parse(value);
  } catch {
    return undefined;
  }
}

export function hasStoredPolicy(db: AppDatabase): boolean {
  return readSettings(db, POLICY_KEY_PREFIX).size > 0;
}

function fieldOr<T>(
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  stored: string | undefined,
  fallback: T,
): T {
  const value = decode(stored);
  if (value === undefined) return fallback;
  const result = schema.safeParse(value);
  return result.success ? result.data : fallback;
}

/**
 * Reads the alert policy written by the settings owner. Fields that are
 * missing or invalid fall back to `fallback` one by one.
 */
export function readAlertPolicy(
  db: AppDatabase,
  fallback: AlertPolicy,
): AlertPolicy {
  const values = readSettings(db, POLICY_KEY_PREFIX);
  const policy = alertPolicySchema.shape;
  const quiet = quietHoursSchema.shape;

  return {
    enabled: fieldOr(policy.enabled, values.get(POLICY_KEYS.enabled), fallback.enabled),
    windowDays: fieldOr(
      policy.windowDays,
      values.get(POLICY_KEYS.windowDays),
      fallback.windowDays,
    ),
    throttleHours: fieldOr(
      policy.throttleHours,
      values.get(POLICY_KEYS.throttleHours),
      fallback.throttleHours,
    ),
    pollIntervalMinutes: fieldOr(
      policy.pollIntervalMinutes,
      values.get(POLICY_KEYS.pollIntervalMinutes),
      fallback.pollIntervalMinutes,
    ),
    autoSync: fieldOr(policy.autoSync, values.get(POLICY_KEYS.autoSync), fallback.autoSync),
    quietHours: {
      enabled: fieldOr(
        quiet.enabled,
        values.get(POLICY_KEYS.quietHoursEnabled),
        fallback.quietHours.enabled,
      ),
      startHour: fieldOr(
        quiet.startHour,
        values.get(POLICY_KEYS.quietHoursStartHour),
        fallback.quietHours.startHour,
      ),
      endHour: fieldOr(
        quiet.endHour,
        values.get(POLICY_KEYS.quietHoursEndHour),
        fallback.quietHours.endHour,
      ),
      appliesToRevisions: fieldOr(
        quiet.appliesToRevisions,
        values.get(POLICY_KEYS.quietHoursAppliesToRevisions),
        fallback.quietHours.appliesToRevisions,
      ),
    },
  };
}

export function writeAlertPolicy(db: AppDatabase, policy: AlertPolicy): void {
  const entries: ReadonlyArray<readonly [string, unknown]> = [
    [POLICY_KEYS.enabled, policy.enabled],
    [POLICY_KEYS.windowDays, policy.windowDays],
    [POLICY_KEYS.throttleHours, policy.throttleHours],
    [POLICY_KEYS.pollIntervalMinutes, policy.pollIntervalMinutes],
    [POLICY_KEYS.autoSync, policy.autoSync],
    [POLICY_KEYS.quietHoursEnabled, policy.quietHours.enabled],
    [POLICY_KEYS.quietHoursStartHour, policy.quietHours.startHour],
    [POLICY_KEYS.quietHoursEndHour, policy.quietHours.endHour],
    [
      POLICY_KEYS.quietHoursAppliesToRevisions,
      policy.quietHours.appliesToRevisions,
    ],
  ];

  db.transaction((tx) => {
    for (const [key, value] of entries) {
      writeSetting(tx, key, JSON.stringify(value));
    }
  });
}

/**
 * Merges a patch into the current policy. A changed poll interval or a
 * toggled `autoSync` comes back as a `reschedule` effect for the scheduler
 * owner to apply.
 */
export function applyPolicyPatch(
  current: AlertPolicy,
  patch: AlertPolicyPatch,
): { readonly policy: AlertPolicy; readonly effects: ReadonlyArray<PolicyEffect> } {
  const policy = alertPolicySchema.parse({
    ...current,
    ...patch,
    quietHours: { ...current.quietHours, ...patch.quietHours },
  });

  const timerChanged =
    policy.pollIntervalMinutes !== current.pollIntervalMinutes ||
    policy.autoSync !== current.autoSync;
  const effects: Array<PolicyEffect> = timerChanged
    ? [
        {
          type: "reschedule",
          pollIntervalMinutes: policy.pollIntervalMinutes,
          autoSync: policy.autoSync,
        },
      ]
    : [];

  return { policy, effects };
}
