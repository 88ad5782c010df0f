import { resolve } from "node:path";
import { createLogger } from "./logger";
import { loadConfig } from "./config";
import type { AppConfig } from "./config";
import { createDatabase, migrateDatabase } from "./db";
import { seedAlertPolicy } from "./seed";
import { createRevisionScheduler } from "./scheduler";
import { fetchRosterFeed } from "./pipeline/fetcher";
import type { FeedCredentials } from "./pipeline/fetcher";
import { createLogNotifier, createMailgunNotifier } from "./notify";
import type { Notifier } from "./notify";
import { createApiServer } from "./api/server";
import { registerShutdownHandlers } from "./lifecycle";

const DATABASE_URL = process.env["DATABASE_URL"] ?? "./data/roster-watch.db";
const PORT = parseInt(process.env["PORT"] ?? "3000", 10);

function readCredentials(): FeedCredentials | null {
  const username = process.env["ROSTER_USERNAME"];
  const password = process.env["ROSTER_PASSWORD"];
  return username && password ? { username, password } : null;
}

async function main(): Promise<void> {
  const logger = createLogger();

  logger.info("roster-watch starting");

  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    logger.fatal(
      { error: err instanceof Error ? err.message : String(err) },
      "configuration error",
    );
    process.exit(1);
  }

  logger.info({ feedUrl: config.feed.url }, "config loaded");

  const { db, close: closeDb } = createDatabase(resolve(DATABASE_URL));

  migrateDatabase(db);
  logger.info("database migrations applied");

  seedAlertPolicy(db, config, logger);

  const credentials = readCredentials();
  if (!credentials) {
    logger.warn(
      "ROSTER_USERNAME or ROSTER_PASSWORD not set, scheduled polls will be skipped",
    );
  }

  const apiKey = process.env["MAILGUN_API_KEY"];
  const domain = process.env["MAILGUN_DOMAIN"];
  const recipient = config.notify.recipient;

  let notifier: Notifier;
  if (apiKey && domain && recipient) {
    notifier = createMailgunNotifier(apiKey, domain, recipient, logger);
    logger.info({ recipient }, "e-mail alerts enabled");
  } else {
    notifier = createLogNotifier(logger);
    logger.warn(
      "MAILGUN_API_KEY, MAILGUN_DOMAIN or notify.recipient not set, alerts go to the log only",
    );
  }

  const scheduler = createRevisionScheduler({
    db,
    config,
    logger,
    notifier,
    fetchFeed: fetchRosterFeed,
    credentials,
  });

  const app = createApiServer({ db, config, logger, notifier, scheduler });
  const server = app.listen(PORT, () => {
    logger.info({ port: PORT }, "api server listening");
  });

  registerShutdownHandlers({ scheduler, server, closeDb, logger });
}

main().catch((err) => {
  console.error("fatal startup error:", err);
  process.exit(1);
});
