/**
 * Schedule Evaluator
 *
 * Pure functions mapping a schedule to its expected timeline. The ingestor and
 * the sweep detector both resolve occurrences here, so for a given
 * (schedule, anchor) every caller sees the same instants.
 */

import { ValidationError } from "../lib/errors";
import type { Schedule } from "../types/monitor";
import { compileCrontab, nextCronOccurrence, previousCronOccurrence } from "./crontab";
import { nextIntervalOccurrence, previousIntervalOccurrence } from "./interval";
import { isValidTimezone, MINUTE_MS } from "./timezone";

export type WindowPosition = "on_time" | "late" | "missed";

function nextMs(schedule: Schedule, afterMs: number, anchorMs: number): number | null {
  switch (schedule.type) {
    case "crontab":
      return nextCronOccurrence(compileCrontab(schedule.expr), afterMs, schedule.timezone);
    case "interval":
      return nextIntervalOccurrence(schedule, anchorMs, afterMs);
    default: {
      const exhaustive: never = schedule;
      return exhaustive;
    }
  }
}

function previousMs(schedule: Schedule, atOrBeforeMs: number, anchorMs: number): number | null {
  switch (schedule.type) {
    case "crontab":
      return previousCronOccurrence(compileCrontab(schedule.expr), atOrBeforeMs, schedule.timezone);
    case "interval":
      return previousIntervalOccurrence(schedule, anchorMs, atOrBeforeMs);
    default: {
      const exhaustive: never = schedule;
      return exhaustive;
    }
  }
}

function toDate(ms: number | null): Date | null {
  return ms === null ? null : new Date(ms);
}

/**
 * First expected occurrence strictly after `after`.
 * Returns null only for a crontab that never fires within the search horizon.
 */
export function nextExpected(schedule: Schedule, after: Date, anchor: Date): Date | null {
  return toDate(nextMs(schedule, after.getTime(), anchor.getTime()));
}

/**
 * Last expected occurrence at or before `atOrBefore`
 */
export function previousExpected(schedule: Schedule, atOrBefore: Date, anchor: Date): Date | null {
  return toDate(previousMs(schedule, atOrBefore.getTime(), anchor.getTime()));
}

/**
 * Occurrence closest to `at`; ties go to the earlier one
 */
export function nearestExpected(schedule: Schedule, at: Date, anchor: Date): Date | null {
  const t = at.getTime();
  const prev = previousMs(schedule, t, anchor.getTime());
  if (prev === t) return new Date(t);

  const next = nextMs(schedule, t, anchor.getTime());
  if (prev === null) return toDate(next);
  if (next === null) return new Date(prev);

  return new Date(t - prev <= next - t ? prev : next);
}

/**
 * The occurrence a check-in at `at` belongs to: the previous occurrence while
 * `at` is still inside its margin, otherwise the nearest one. Falls back to the
 * minute of `at` when the schedule yields no occurrence at all.
 */
export function resolveExpectedAt(
  schedule: Schedule,
  at: Date,
  anchor: Date,
  marginMinutes: number,
): Date {
  const prev = previousExpected(schedule, at, anchor);
  if (prev && at.getTime() - prev.getTime() <= marginMinutes * MINUTE_MS) {
    return prev;
  }

  const nearest = nearestExpected(schedule, at, anchor);
  if (nearest) return nearest;

  return new Date(Math.floor(at.getTime() / MINUTE_MS) * MINUTE_MS);
}

/**
 * Classify `now` against an expected occurrence and its margin
 */
export function inWindow(
  _schedule: Schedule,
  expected: Date,
  marginMinutes: number,
  now: Date,
): WindowPosition {
  const t = now.getTime();
  if (t <= expected.getTime()) return "on_time";
  if (t <= expected.getTime() + marginMinutes * MINUTE_MS) return "late";
  return "missed";
}

/**
 * Reject schedules the evaluator cannot run
 * @throws ValidationError
 */
export function validateSchedule(schedule: Schedule): void {
  if (!isValidTimezone(schedule.timezone)) {
    throw new ValidationError(`Unknown timezone "${schedule.timezone}"`, [
      { path: "schedule.timezone", message: "must be an IANA timezone name" },
    ]);
  }

  switch (schedule.type) {
    case "crontab":
      compileCrontab(schedule.expr);
      return;
    case "interval":
      if (!Number.isInteger(schedule.value) || schedule.value < 1) {
        throw new ValidationError(`Interval value must be a positive integer, got ${schedule.value}`, [
          { path: "schedule.value", message: "must be a positive integer" },
        ]);
      }
      return;
    default: {
      const exhaustive: never = schedule;
      throw new ValidationError(`Unknown schedule type: ${JSON.stringify(exhaustive)}`);
    }
  }
}
