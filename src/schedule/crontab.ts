import { Cron } from "croner";
import { ValidationError } from "../lib/errors";
import { DAY_MS, instantsAtWall, MINUTE_MS, offsetAt } from "./timezone";

/**
 * Standard 5-field crontab: minute hour day-of-month month day-of-week
 *
 * croner finds matching wall-clock times on a UTC timeline; the timezone
 * layer maps each one to real instants. A wall time skipped by a DST jump
 * maps to none, a wall time doubled by a fallback maps to both.
 */

const CRON_FIELD_COUNT = 5;

// Wall matches examined per lookup before giving up
const MAX_WALL_MATCHES = 1_000;

// How far back previousCronOccurrence looks for a bracketing occurrence
const LOOKBACK_MS = [60 * MINUTE_MS, DAY_MS, 32 * DAY_MS, 366 * DAY_MS, 5 * 366 * DAY_MS];

const MACROS: Record<string, string> = {
  "@yearly": "0 0 1 1 *",
  "@annually": "0 0 1 1 *",
  "@monthly": "0 0 1 * *",
  "@weekly": "0 0 * * 0",
  "@daily": "0 0 * * *",
  "@midnight": "0 0 * * *",
  "@hourly": "0 * * * *",
};

const cache = new Map<string, Cron>();

function invalid(expr: string, detail: string): ValidationError {
  return new ValidationError(`Invalid crontab "${expr}": ${detail}`, [
    { path: "schedule.value", message: detail },
  ]);
}

/**
 * Compile a crontab expression (or macro) into a wall-clock matcher
 * @throws ValidationError when the expression is malformed or can never fire
 */
export function compileCrontab(expr: string): Cron {
  const cached = cache.get(expr);
  if (cached) return cached;

  const trimmed = expr.trim();
  const source = MACROS[trimmed.toLowerCase()] ?? trimmed;
  const fieldCount = source.split(/\s+/).length;
  if (fieldCount !== CRON_FIELD_COUNT) {
    throw invalid(expr, `expected ${CRON_FIELD_COUNT} fields, got ${fieldCount}`);
  }

  let cron: Cron;
  try {
    cron = new Cron(source, { timezone: "UTC" });
  } catch (error) {
    throw invalid(expr, error instanceof Error ? error.message : "unparseable");
  }

  if (cron.nextRun(new Date(0)) === null) {
    throw invalid(expr, "no calendar date satisfies the day-of-month and month fields");
  }

  cache.set(expr, cron);
  return cron;
}

/**
 * First occurrence strictly after `afterMs`, evaluated on the wall clock of `timezone`
 */
export function nextCronOccurrence(cron: Cron, afterMs: number, timezone: string): number | null {
  // A fallback can rewind the wall clock, so start from the smaller nearby offset
  const minOffset = Math.min(offsetAt(afterMs, timezone), offsetAt(afterMs + DAY_MS, timezone));
  let wall = new Date(afterMs + minOffset);

  for (let i = 0; i < MAX_WALL_MATCHES; i++) {
    const match = cron.nextRun(wall);
    if (!match) return null;

    const instant = instantsAtWall(match.getTime(), timezone).find((t) => t > afterMs);
    if (instant !== undefined) return instant;
    wall = match;
  }

  return null;
}

/**
 * Last occurrence at or before `atOrBeforeMs`
 */
export function previousCronOccurrence(
  cron: Cron,
  atOrBeforeMs: number,
  timezone: string,
): number | null {
  const occursBy = (from: number) => {
    const next = nextCronOccurrence(cron, from, timezone);
    return next !== null && next <= atOrBeforeMs;
  };

  const lookback = LOOKBACK_MS.find((span) => occursBy(atOrBeforeMs - span));
  if (lookback === undefined) return null;

  // Occurrences are whole minutes: narrow (lo, hi] until it holds exactly one
  let lo = atOrBeforeMs - lookback;
  let hi = atOrBeforeMs;
  while (hi - lo > MINUTE_MS) {
    const mid = Math.floor((lo + hi) / 2);
    if (occursBy(mid)) {
      lo = mid;
    } else {
      hi = mid;
    }
  }

  return nextCronOccurrence(cron, lo, timezone);
}
