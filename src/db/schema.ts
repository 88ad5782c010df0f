import { integer, sqliteTable, text } from "drizzle-orm/sqlite-core";
import { sql } from "drizzle-orm";

// ---------- Tables ----------

/**
 * Flat key/value store shared with companion processes that open the same
 * SQLite file. Keys are dotted and namespaced (`roster.revision.*`,
 * `roster.policy.*`); values are plain strings.
 */
export const settings = sqliteTable("settings", {
  key: text("key").primaryKey(),
  value: text("value").notNull(),
  updatedAt: integer("updated_at", { mode: "timestamp" })
    .notNull()
    .default(sql`(unixepoch())`),
});
