// pattern: Imperative Shell
import type { Logger } from "pino";

export type Stoppable = {
  readonly stop: () => void;
};

export type Closable = {
  readonly close: (callback: (err?: Error) => void) => void;
};

export type ShutdownDeps = {
  readonly scheduler: Stoppable;
  readonly server: Closable | null;
  readonly closeDb: () => void;
  readonly logger: Logger;
};

/**
 * Registers SIGTERM and SIGINT handlers. On the first signal the poll timer
 * is stopped, the HTTP listener stops accepting connections, the database is
 * closed and the process exits with code 0. Each step runs even if an
 * earlier one throws; repeated signals are ignored.
 *
 * @returns The shutdown routine the handlers call
 */
export function registerShutdownHandlers(
  deps: ShutdownDeps,
): (signal: string) => void {
  let shuttingDown = false;

  const step = (label: string, run: () => void) => {
    try {
      run();
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      deps.logger.error({ error: message }, `error ${label}`);
    }
  };

  const shutdown = (signal: string) => {
    if (shuttingDown) return;
    shuttingDown = true;

    deps.logger.info({ signal }, "shutdown signal received");

    step("stopping poll scheduler", () => deps.scheduler.stop());

    step("closing http server", () =>
      deps.server?.close((err) => {
        if (err) {
          deps.logger.warn({ error: err.message }, "http server close reported an error");
        }
      }),
    );

    step("closing database", () => {
      deps.closeDb();
      deps.logger.info("database connection closed");
    });

    deps.logger.info("shutdown complete");
    process.exit(0);
  };

  process.on("SIGTERM", () => shutdown("SIGTERM"));
  process.on("SIGINT", () => shutdown("SIGINT"));

  return shutdown;
}
