// pattern: Imperative Shell
import type { Logger } from "pino";
import type { Notifier } from "./types";

/**
 * Notifier used when no delivery channel is configured: alerts are written
 * to the structured log only.
 */
export function createLogNotifier(logger: Logger): Notifier {
  let sequence = 0;

  return {
    deliver: async (alert) => {
      sequence++;
      logger.warn(
        {
          identifier: alert.identifier,
          title: alert.title,
          body: alert.body,
          deepLink: alert.deepLink,
        },
        "revision alert (no delivery channel configured)",
      );
      return { success: true, messageId: `log-${sequence}` };
    },
    retract: async (identifier) => {
      logger.info({ identifier }, "revision alert withdrawn");
    },
  };
}
