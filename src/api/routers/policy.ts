// pattern: Imperative Shell
import { z } from "zod";
import { router, publicProcedure } from "../trpc";
import { alertPolicySchema, quietHoursSchema } from "../../config/schema";
import {
  applyPolicyPatch,
  readAlertPolicy,
  writeAlertPolicy,
} from "../../state/policy";

const policyPatchSchema = z
  .object({
    enabled: alertPolicySchema.shape.enabled.removeDefault(),
    windowDays: alertPolicySchema.shape.windowDays.removeDefault(),
    throttleHours: alertPolicySchema.shape.throttleHours.removeDefault(),
    pollIntervalMinutes:
      alertPolicySchema.shape.pollIntervalMinutes.removeDefault(),
    autoSync: alertPolicySchema.shape.autoSync.removeDefault(),
    quietHours: z
      .object({
        enabled: quietHoursSchema.shape.enabled.removeDefault(),
        startHour: quietHoursSchema.shape.startHour.removeDefault(),
        endHour: quietHoursSchema.shape.endHour.removeDefault(),
        appliesToRevisions:
          quietHoursSchema.shape.appliesToRevisions.removeDefault(),
      })
      .partial(),
  })
  .partial();

export const policyRouter = router({
  get: publicProcedure.query(({ ctx }) => {
    return readAlertPolicy(ctx.db, ctx.config.alerts);
  }),

  update: publicProcedure
    .input(policyPatchSchema)
    .mutation(({ ctx, input }) => {
      const current = readAlertPolicy(ctx.db, ctx.config.alerts);
      const { policy, effects } = applyPolicyPatch(current, input);

      writeAlertPolicy(ctx.db, policy);
      ctx.logger.info({ policy }, "alert policy updated");

      for (const effect of effects) {
        ctx.scheduler.reschedule({
          pollIntervalMinutes: effect.pollIntervalMinutes,
          autoSync: effect.autoSync,
        });
      }

      return policy;
    }),
});
