import { z } from "zod";

export const WINDOW_DAYS = [3, 5, 7, 14, 30] as const;
export const THROTTLE_HOURS = [6, 12, 24, 48] as const;
export const POLL_INTERVAL_MINUTES = [15, 30, 60, 120, 240] as const;

const hourSchema = z.number().int().min(0).max(23);

function oneOf<T extends number>(values: ReadonlyArray<T>) {
  return z
    .number()
    .int()
    .refine((value): value is T => values.some((allowed) => allowed === value), {
      message: `must be one of ${values.join(", ")}`,
    });
}

export const quietHoursSchema = z.object({
  enabled: z.boolean().default(false),
  startHour: hourSchema.default(22),
  endHour: hourSchema.default(6),
  appliesToRevisions: z.boolean().default(true),
});

export const alertPolicySchema = z.object({
  enabled: z.boolean().default(true),
  windowDays: oneOf(WINDOW_DAYS).default(7),
  throttleHours: oneOf(THROTTLE_HOURS).default(12),
  pollIntervalMinutes: oneOf(POLL_INTERVAL_MINUTES).default(60),
  autoSync: z.boolean().default(true),
  quietHours: quietHoursSchema.default({}),
});

export const appConfigSchema = z.object({
  feed: z.object({
    url: z
      .string()
      .url()
      .refine((value) => /^(https?|webcal):\/\//i.test(value), {
        message: "must use http, https or webcal",
      }),
    timeoutMs: z.number().int().positive().default(30_000),
  }),
  alerts: alertPolicySchema.default({}),
  notify: z
    .object({
      recipient: z.string().email().optional(),
      portalUrl: z.string().url().optional(),
      timeZone: z
        .string()
        .min(1)
        .refine(isKnownTimeZone, { message: "unknown IANA time zone" })
        .optional(),
    })
    .default({}),
});

function isKnownTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat("en-US", { timeZone });
    return true;
  } catch {
    return false;
  }
}

export type AlertPolicy = z.infer<typeof alertPolicySchema>;
export type QuietHours = z.infer<typeof quietHoursSchema>;
export type AppConfig = z.infer<typeof appConfigSchema>;
