/**
 * Test fixture builders for monitor configs and records
 */

import { newMonitorRecord } from "../../store/operations";
import type {
  CheckIn,
  IntervalUnit,
  MonitorConfig,
  MonitorKey,
  MonitorRecord,
} from "../../types/monitor";

export const PRODUCTION = "production";

/**
 * Crontab monitor, nightly at 02:00 UTC by default
 */
export function cronConfig(overrides?: {
  expr?: string;
  timezone?: string;
  checkinMargin?: number;
  maxRuntime?: number;
  failureThreshold?: number;
  recoveryThreshold?: number;
}): MonitorConfig {
  return {
    schedule: {
      type: "crontab",
      expr: overrides?.expr ?? "0 2 * * *",
      timezone: overrides?.timezone ?? "UTC",
    },
    checkinMargin: overrides?.checkinMargin ?? 10,
    maxRuntime: overrides?.maxRuntime ?? 30,
    failureThreshold: overrides?.failureThreshold ?? 1,
    recoveryThreshold: overrides?.recoveryThreshold ?? 1,
  };
}

/**
 * Interval monitor, every 5 minutes by default
 */
export function intervalConfig(overrides?: {
  value?: number;
  unit?: IntervalUnit;
  checkinMargin?: number;
  maxRuntime?: number;
  failureThreshold?: number;
  recoveryThreshold?: number;
}): MonitorConfig {
  return {
    schedule: {
      type: "interval",
      value: overrides?.value ?? 5,
      unit: overrides?.unit ?? "minute",
      timezone: "UTC",
    },
    checkinMargin: overrides?.checkinMargin ?? 1,
    maxRuntime: overrides?.maxRuntime ?? 0,
    failureThreshold: overrides?.failureThreshold ?? 1,
    recoveryThreshold: overrides?.recoveryThreshold ?? 1,
  };
}

export function monitorKey(slug = "nightly-report", environment = PRODUCTION): MonitorKey {
  return { slug, environment };
}

export function createMonitorRecord(
  config: MonitorConfig,
  createdAt: Date,
  key: MonitorKey = monitorKey(),
): MonitorRecord {
  return newMonitorRecord(key, config, createdAt);
}

export function checkIn(
  status: CheckIn["status"],
  timestamp: string,
  overrides?: Partial<Omit<CheckIn, "status" | "timestamp">>,
): CheckIn {
  return {
    slug: overrides?.slug ?? "nightly-report",
    environment: overrides?.environment ?? PRODUCTION,
    status,
    timestamp: new Date(timestamp),
    ...(overrides?.checkInId !== undefined && { checkInId: overrides.checkInId }),
    ...(overrides?.durationSeconds !== undefined && { durationSeconds: overrides.durationSeconds }),
  };
}
