import type { IntervalSchedule, IntervalUnit } from "../types/monitor";
import { daysInMonth, MINUTE_MS, wallClock, zonedToEpoch } from "./timezone";

const FIXED_UNIT_MS: Partial<Record<IntervalUnit, number>> = {
  minute: MINUTE_MS,
  hour: 60 * MINUTE_MS,
  day: 24 * 60 * MINUTE_MS,
  week: 7 * 24 * 60 * MINUTE_MS,
};

function monthsPerStep(schedule: IntervalSchedule): number {
  return schedule.unit === "year" ? schedule.value * 12 : schedule.value;
}

/**
 * Nth occurrence of a calendar interval: the anchor's wall clock moved by
 * N steps of months, day clamped to the target month's length
 */
function calendarOccurrence(schedule: IntervalSchedule, anchorMs: number, n: number): number {
  const wall = wallClock(anchorMs, schedule.timezone);
  const subMinute = anchorMs - Math.floor(anchorMs / MINUTE_MS) * MINUTE_MS;

  const monthIndex = wall.year * 12 + (wall.month - 1) + n * monthsPerStep(schedule);
  const year = Math.floor(monthIndex / 12);
  const month = (monthIndex % 12) + 1;
  const day = Math.min(wall.day, daysInMonth(year, month));

  return zonedToEpoch(
    { year, month, day, hour: wall.hour, minute: wall.minute },
    schedule.timezone,
    subMinute,
  );
}

// Largest N with occurrence(N) <= t, or -1 when t precedes the anchor
function lastIndexAtOrBefore(schedule: IntervalSchedule, anchorMs: number, t: number): number {
  if (t < anchorMs) return -1;

  const fixed = FIXED_UNIT_MS[schedule.unit];
  if (fixed !== undefined) {
    return Math.floor((t - anchorMs) / (schedule.value * fixed));
  }

  const from = wallClock(anchorMs, schedule.timezone);
  const to = wallClock(t, schedule.timezone);
  const monthsApart = (to.year - from.year) * 12 + (to.month - from.month);
  let n = Math.max(0, Math.floor(monthsApart / monthsPerStep(schedule)));

  while (n > 0 && calendarOccurrence(schedule, anchorMs, n) > t) n--;
  while (calendarOccurrence(schedule, anchorMs, n + 1) <= t) n++;
  return n;
}

export function intervalOccurrence(schedule: IntervalSchedule, anchorMs: number, n: number): number {
  const fixed = FIXED_UNIT_MS[schedule.unit];
  if (fixed !== undefined) {
    return anchorMs + n * schedule.value * fixed;
  }
  return calendarOccurrence(schedule, anchorMs, n);
}

/**
 * First occurrence strictly after `afterMs`. The timeline is always
 * `anchor + N * interval`, never relative to the last run.
 */
export function nextIntervalOccurrence(
  schedule: IntervalSchedule,
  anchorMs: number,
  afterMs: number,
): number {
  const n = lastIndexAtOrBefore(schedule, anchorMs, afterMs);
  return intervalOccurrence(schedule, anchorMs, n + 1);
}

export function previousIntervalOccurrence(
  schedule: IntervalSchedule,
  anchorMs: number,
  atOrBeforeMs: number,
): number | null {
  const n = lastIndexAtOrBefore(schedule, anchorMs, atOrBeforeMs);
  return n < 0 ? null : intervalOccurrence(schedule, anchorMs, n);
}
