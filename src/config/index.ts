import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { parse } from "yaml";
import { appConfigSchema } from "./schema";
import type { AppConfig, AlertPolicy, QuietHours } from "./schema";

export const DEFAULT_CONFIG_PATH = "./config.yaml";

/**
 * Loads and validates the YAML config. Without an explicit path, `CONFIG_PATH`
 * is used, then `./config.yaml`; relative paths resolve against the working
 * directory.
 */
export function loadConfig(
  path: string = process.env["CONFIG_PATH"] ?? DEFAULT_CONFIG_PATH,
): AppConfig {
  const configPath = resolve(path);
  let raw: string;
  try {
    raw = readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to read config file at ${configPath}: ${message}`);
  }

  let parsed: unknown;
  try {
    parsed = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new Error(`failed to parse YAML in ${configPath}: ${message}`);
  }

  const result = appConfigSchema.safeParse(parsed);
  if (!result.success) {
    const issues = result.error.issues
      .map((i) => `  - ${i.path.join(".")}: ${i.message}`)
      .join("\n");
    throw new Error(`invalid configuration in ${configPath}:\n${issues}`);
  }

  return result.data;
}

export type { AppConfig, AlertPolicy, QuietHours };
