import pino from "pino";

/**
 * Creates the service logger: JSON lines on stdout, level labels instead of
 * numbers, ISO 8601 timestamps.
 *
 * @param level - Overrides `LOG_LEVEL` (default `info`)
 */
export function createLogger(level?: string): pino.Logger {
  return pino({
    name: "roster-watch",
    level: level ?? process.env["LOG_LEVEL"] ?? "info",
    formatters: {
      level(label: string) {
        return { level: label };
      },
    },
    timestamp: pino.stdTimeFunctions.isoTime,
    redact: ["credentials.password", "headers.Authorization"],
  });
}
