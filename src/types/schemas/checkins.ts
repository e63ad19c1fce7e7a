/**
 * Zod schemas for the check-in and monitor endpoints
 * Wire payloads are snake_case; they are mapped to the internal camelCase
 * types before reaching the ingestor.
 */

import { z } from "zod";
import {
  type CheckIn,
  CheckInStatusSchema,
  IntervalUnitSchema,
  type MonitorConfig,
} from "../monitor";

export const DEFAULT_ENVIRONMENT = "production";

/**
 * Monitor slug, shared by every /monitors/:slug route
 */
export const MonitorSlugSchema = z
  .string()
  .min(1, "Slug is required")
  .max(50)
  .regex(/^[a-z0-9][a-z0-9_-]*$/, "Slug may only contain lowercase letters, digits, '-' and '_'");

// "/" separates environment and slug in store keys
const EnvironmentSchema = z
  .string()
  .min(1)
  .max(64)
  .regex(/^[^/\s]+$/, "Environment may not contain '/' or whitespace");

export const MonitorParamsSchema = z.object({
  slug: MonitorSlugSchema,
});

export type MonitorParams = z.infer<typeof MonitorParamsSchema>;

export const WireScheduleSchema = z.discriminatedUnion("type", [
  z.object({
    type: z.literal("crontab"),
    value: z.string().min(1, "Crontab expression is required"),
  }),
  z.object({
    type: z.literal("interval"),
    value: z.number().int().positive(),
    unit: IntervalUnitSchema,
  }),
]);

export const WireMonitorConfigSchema = z.object({
  schedule: WireScheduleSchema,
  timezone: z.string().min(1).default("UTC"),
  checkin_margin: z.number().int().min(0).default(1),
  max_runtime: z.number().int().min(0).default(30),
  failure_issue_threshold: z.number().int().min(1).default(1),
  recovery_threshold: z.number().int().min(1).default(1),
});

export type WireMonitorConfig = z.infer<typeof WireMonitorConfigSchema>;

/**
 * Body of POST /monitors/:slug/checkins
 */
export const CheckInBodySchema = z.object({
  environment: EnvironmentSchema.default(DEFAULT_ENVIRONMENT),
  status: CheckInStatusSchema,
  check_in_id: z.string().min(1).max(128).optional(),
  duration_seconds: z.number().min(0).optional(),
  timestamp: z.string().datetime({ offset: true }).optional(),
  monitor_config: WireMonitorConfigSchema.optional(),
});

export type CheckInBody = z.infer<typeof CheckInBodySchema>;

export const MonitorQuerySchema = z.object({
  environment: EnvironmentSchema.default(DEFAULT_ENVIRONMENT),
});

export const CheckInsQuerySchema = z.object({
  environment: EnvironmentSchema.default(DEFAULT_ENVIRONMENT),
  limit: z
    .string()
    .regex(/^\d+$/, "Limit must be a number")
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().min(1).max(100))
    .default("20"),
});

export function toMonitorConfig(wire: WireMonitorConfig): MonitorConfig {
  const { schedule, timezone } = wire;
  return {
    schedule:
      schedule.type === "crontab"
        ? { type: "crontab", expr: schedule.value, timezone }
        : { type: "interval", value: schedule.value, unit: schedule.unit, timezone },
    checkinMargin: wire.checkin_margin,
    maxRuntime: wire.max_runtime,
    failureThreshold: wire.failure_issue_threshold,
    recoveryThreshold: wire.recovery_threshold,
  };
}

/**
 * A check-in without a timestamp is stamped with its receive time
 */
export function toCheckIn(slug: string, body: CheckInBody, receivedAt: Date): CheckIn {
  return {
    slug,
    environment: body.environment,
    status: body.status,
    timestamp: body.timestamp ? new Date(body.timestamp) : receivedAt,
    ...(body.check_in_id !== undefined && { checkInId: body.check_in_id }),
    ...(body.duration_seconds !== undefined && { durationSeconds: body.duration_seconds }),
  };
}
