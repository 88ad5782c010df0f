import type { Logger } from "pino";
import type { AppDatabase } from "./db";
import type { AppConfig } from "./config";
import { hasStoredPolicy, writeAlertPolicy } from "./state/policy";

/**
 * Writes the alert policy from configuration into the settings store on first
 * start. Once any policy key exists the store is the source of truth and the
 * config file's `alerts` section only supplies fallbacks for missing keys.
 */
export function seedAlertPolicy(
  db: AppDatabase,
  config: AppConfig,
  logger: Logger,
): void {
  if (hasStoredPolicy(db)) {
    logger.info("alert policy already stored, skipping seed");
    return;
  }

  writeAlertPolicy(db, config.alerts);
  logger.info({ policy: config.alerts }, "alert policy seeded from config");
}
