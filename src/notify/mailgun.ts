// pattern: Imperative Shell
import Mailgun from "mailgun.js";
import FormData from "form-data";
import type { Logger } from "pino";
import type { Notifier } from "./types";

export const MAILGUN_TIMEOUT_MS = 30_000;

/**
 * Creates a Mailgun-backed notifier that e-mails revision alerts.
 *
 * The stable alert identifier is sent as the message tag so repeated alerts
 * group together in the mailbox. Sent e-mail cannot be recalled, so
 * `retract` only records that the alert is no longer current.
 */
export function createMailgunNotifier(
  apiKey: string,
  domain: string,
  recipient: string,
  logger: Logger,
): Notifier {
  const mailgun = new Mailgun(FormData);
  const mg = mailgun.client({
    username: "api",
    key: apiKey,
    timeout: MAILGUN_TIMEOUT_MS,
  });

  return {
    deliver: async (alert) => {
      const text = alert.deepLink.url
        ? `${alert.body}\n\n${alert.deepLink.url}`
        : alert.body;

      try {
        const result = await mg.messages.create(domain, {
          from: `Roster Watch <noreply@${domain}>`,
          to: [recipient],
          subject: alert.title,
          text,
          "o:tag": alert.identifier,
        });

        logger.info(
          { messageId: result.id, recipient, identifier: alert.identifier },
          "revision alert e-mailed",
        );
        return { success: true, messageId: result.id ?? "unknown" };
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        logger.error(
          { recipient, identifier: alert.identifier, error: message },
          "revision alert e-mail failed",
        );
        return { success: false, error: message };
      }
    },

    retract: async (identifier) => {
      logger.info(
        { identifier, recipient },
        "revision alert withdrawn, e-mail already sent stays in the mailbox",
      );
    },
  };
}
