import { z } from "zod";

// Schedule (tagged union, dispatched on `type`)
export const IntervalUnitSchema = z.enum(["minute", "hour", "day", "week", "month", "year"]);

export type IntervalUnit = z.infer<typeof IntervalUnitSchema>;

export const CrontabScheduleSchema = z.object({
  type: z.literal("crontab"),
  expr: z.string().min(1),
  timezone: z.string().default("UTC"),
});

export const IntervalScheduleSchema = z.object({
  type: z.literal("interval"),
  value: z.number().int().positive(),
  unit: IntervalUnitSchema,
  timezone: z.string().default("UTC"),
});

export const ScheduleSchema = z.discriminatedUnion("type", [
  CrontabScheduleSchema,
  IntervalScheduleSchema,
]);

export type CrontabSchedule = z.infer<typeof CrontabScheduleSchema>;
export type IntervalSchedule = z.infer<typeof IntervalScheduleSchema>;
export type Schedule = z.infer<typeof ScheduleSchema>;

export const MonitorConfigSchema = z.object({
  schedule: ScheduleSchema,
  checkinMargin: z.number().int().min(0), // minutes
  maxRuntime: z.number().int().min(0), // minutes, 0 = unbounded
  failureThreshold: z.number().int().min(1),
  recoveryThreshold: z.number().int().min(1),
});

export type MonitorConfig = z.infer<typeof MonitorConfigSchema>;

export const MonitorStatusSchema = z.enum(["up", "down"]);
export type MonitorStatus = z.infer<typeof MonitorStatusSchema>;

export const CheckInStatusSchema = z.enum(["in_progress", "ok", "error"]);
export type CheckInStatus = z.infer<typeof CheckInStatusSchema>;

export const TerminalStatusSchema = z.enum(["ok", "error", "missed", "timeout"]);
export type TerminalStatus = z.infer<typeof TerminalStatusSchema>;

// One scheduled occurrence. Margin and max runtime are captured at creation.
export const RunSchema = z.object({
  runId: z.string(),
  expectedAt: z.string(),
  startedAt: z.string().optional(),
  finishedAt: z.string().optional(),
  terminalStatus: TerminalStatusSchema.optional(),
  durationSeconds: z.number().optional(),
  checkinMargin: z.number(),
  maxRuntime: z.number(),
});

export type Run = z.infer<typeof RunSchema>;

export const MonitorStateSchema = z.object({
  status: MonitorStatusSchema,
  consecutiveFailures: z.number().int().min(0),
  consecutiveSuccesses: z.number().int().min(0),
  lastExpectedRunAt: z.string().optional(),
  lastRunId: z.string().optional(),
});

export type MonitorState = z.infer<typeof MonitorStateSchema>;

export const MonitorRecordSchema = z.object({
  slug: z.string(),
  environment: z.string(),
  config: MonitorConfigSchema,
  state: MonitorStateSchema,
  runs: z.array(RunSchema),
  version: z.number().int().min(1),
  createdAt: z.string(),
  updatedAt: z.string(),
  sweptThrough: z.string(), // latest occurrence already examined for Missed
});

export type MonitorRecord = z.infer<typeof MonitorRecordSchema>;

export const CheckInOutcomeSchema = z.enum([
  "started",
  "duplicate",
  "completed",
  "heartbeat",
  "late",
]);

export type CheckInOutcome = z.infer<typeof CheckInOutcomeSchema>;

// Audit log entry for an accepted check-in
export const CheckInEntrySchema = z.object({
  id: z.string(),
  checkInId: z.string().optional(),
  slug: z.string(),
  environment: z.string(),
  status: CheckInStatusSchema,
  timestamp: z.string(),
  durationSeconds: z.number().optional(),
  runId: z.string().optional(),
  outcome: CheckInOutcomeSchema,
  receivedAt: z.string(),
});

export type CheckInEntry = z.infer<typeof CheckInEntrySchema>;

export interface MonitorKey {
  slug: string;
  environment: string;
}

export function monitorKeyString(key: MonitorKey): string {
  return `${key.environment}/${key.slug}`;
}

// Incoming check-in after wire validation
export interface CheckIn {
  slug: string;
  environment: string;
  status: CheckInStatus;
  checkInId?: string;
  durationSeconds?: number;
  timestamp: Date;
}
