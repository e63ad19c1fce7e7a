/**
 * Wall-clock helpers for IANA timezones, built on Intl.DateTimeFormat
 *
 * A "wall" timestamp is the local reading encoded as if it were UTC, so
 * calendar arithmetic can run on plain numbers.
 */

export const MINUTE_MS = 60_000;
export const DAY_MS = 24 * 60 * MINUTE_MS;

export interface WallClock {
  year: number;
  month: number; // 1-12
  day: number; // 1-31
  hour: number; // 0-23
  minute: number; // 0-59
}

const formatters = new Map<string, Intl.DateTimeFormat>();

function formatterFor(timezone: string): Intl.DateTimeFormat {
  let formatter = formatters.get(timezone);
  if (!formatter) {
    formatter = new Intl.DateTimeFormat("en-US", {
      timeZone: timezone,
      hourCycle: "h23",
      year: "numeric",
      month: "numeric",
      day: "numeric",
      hour: "numeric",
      minute: "numeric",
    });
    formatters.set(timezone, formatter);
  }
  return formatter;
}

export function isValidTimezone(timezone: string): boolean {
  if (!timezone) return false;
  try {
    formatterFor(timezone);
    return true;
  } catch (error) {
    if (error instanceof RangeError) return false;
    throw error;
  }
}

/**
 * Wall-clock fields of an instant as seen in the given timezone
 */
export function wallClock(epochMs: number, timezone: string): WallClock {
  const wall: WallClock = { year: 0, month: 0, day: 0, hour: 0, minute: 0 };

  for (const part of formatterFor(timezone).formatToParts(epochMs)) {
    switch (part.type) {
      case "year":
        wall.year = Number(part.value);
        break;
      case "month":
        wall.month = Number(part.value);
        break;
      case "day":
        wall.day = Number(part.value);
        break;
      case "hour":
        wall.hour = Number(part.value) % 24;
        break;
      case "minute":
        wall.minute = Number(part.value);
        break;
    }
  }

  return wall;
}

/**
 * UTC offset (wall minus UTC) in milliseconds at the given instant
 */
export function offsetAt(epochMs: number, timezone: string): number {
  const floored = Math.floor(epochMs / MINUTE_MS) * MINUTE_MS;
  const wall = wallClock(floored, timezone);
  const wallAsUtc = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute);
  return wallAsUtc - floored;
}

export function toWallMs(epochMs: number, timezone: string): number {
  return epochMs + offsetAt(epochMs, timezone);
}

/**
 * Every instant whose wall clock reads `wallMs`, earliest first: none inside
 * a spring-forward gap, two inside a fall-back fold.
 */
export function instantsAtWall(wallMs: number, timezone: string): number[] {
  const offsets = new Set([
    offsetAt(wallMs - DAY_MS, timezone),
    offsetAt(wallMs + DAY_MS, timezone),
  ]);

  return [...offsets]
    .map((offset) => wallMs - offset)
    .filter((candidate) => toWallMs(candidate, timezone) === wallMs)
    .sort((a, b) => a - b);
}

/**
 * Instant at which the wall clock in `timezone` reads the given fields.
 * Wall times inside a DST gap resolve to the instant just past the gap;
 * doubled wall times resolve to the earlier instant.
 */
export function zonedToEpoch(wall: WallClock, timezone: string, extraMs = 0): number {
  const wallMs = Date.UTC(wall.year, wall.month - 1, wall.day, wall.hour, wall.minute) + extraMs;
  const [first] = instantsAtWall(wallMs, timezone);
  if (first !== undefined) return first;

  // Gap: shift by the offset in force before it
  return wallMs - offsetAt(wallMs - DAY_MS, timezone);
}

export function daysInMonth(year: number, month: number): number {
  return new Date(Date.UTC(year, month, 0)).getUTCDate();
}
