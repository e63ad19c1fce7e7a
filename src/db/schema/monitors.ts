import { int, sqliteTable, text } from "drizzle-orm/sqlite-core";

// One row per (environment, slug). `data` holds the serialized record,
// `version` drives compare-and-swap updates.
export const monitors = sqliteTable("monitors", {
  id: text("id").primaryKey(), // environment/slug
  slug: text("slug").notNull(),
  environment: text("environment").notNull(),
  version: int("version").notNull(),
  data: text("data").notNull(), // JSON MonitorRecord
  updatedAt: text("updatedAt").notNull(),
});

export type MonitorRow = typeof monitors.$inferSelect;
export type NewMonitorRow = typeof monitors.$inferInsert;
