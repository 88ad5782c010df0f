// pattern: Functional Core
import type { Logger } from "pino";
import type { AppDatabase } from "../db";
import type { AppConfig } from "../config";
import type { Notifier } from "../notify/types";
import type { RevisionScheduler } from "../scheduler";

/**
 * tRPC context passed to all procedures: the settings database, the loaded
 * configuration, the alert channel and the running poll scheduler.
 */
export type AppContext = {
  readonly db: AppDatabase;
  readonly config: AppConfig;
  readonly logger: Logger;
  readonly notifier: Notifier;
  readonly scheduler: RevisionScheduler;
};
