import { int, real, sqliteTable, text } from "drizzle-orm/sqlite-core";

// Append-only audit log of accepted check-ins
export const checkIns = sqliteTable("check_ins", {
  seq: int("seq").primaryKey({ autoIncrement: true }),
  id: text("id").notNull(),
  monitorId: text("monitorId").notNull(), // environment/slug
  slug: text("slug").notNull(),
  environment: text("environment").notNull(),
  checkInId: text("checkInId"),
  status: text("status", { enum: ["in_progress", "ok", "error"] }).notNull(),
  outcome: text("outcome", {
    enum: ["started", "duplicate", "completed", "heartbeat", "late"],
  }).notNull(),
  runId: text("runId"),
  timestamp: text("timestamp").notNull(),
  durationSeconds: real("durationSeconds"),
  receivedAt: text("receivedAt").notNull(),
});

export type CheckInRow = typeof checkIns.$inferSelect;
export type NewCheckInRow = typeof checkIns.$inferInsert;
