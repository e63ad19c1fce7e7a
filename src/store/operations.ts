/**
 * Store operations shared by the ingestor and the sweep detector
 *
 * upsertMonitor creates or reconfigures a monitor; updateMonitor is the only
 * path for state transitions (read, decide, compare-and-swap, retry).
 */

import { setTimeout as sleep } from "node:timers/promises";
import {
  CheckInServiceError,
  DeadlineExceededError,
  MonitorNotFoundError,
  isRetriable,
} from "../lib/errors";
import { logger } from "../lib/logger";
import { storeRetriesTotal } from "../lib/prometheus";
import { previousExpected, validateSchedule } from "../schedule";
import {
  type MonitorConfig,
  type MonitorKey,
  type MonitorRecord,
  type Schedule,
  monitorKeyString,
} from "../types/monitor";
import { pruneRuns } from "./runs";
import type { MonitorStore } from "./types";

export interface UpdateOptions {
  maxAttempts?: number;
  baseDelayMs?: number;
  signal?: AbortSignal;
  /** Terminal runs kept per monitor; open runs are never pruned */
  runRetention?: number;
}

/**
 * Outcome of one decision round. `next` null means nothing to write.
 */
export interface Decision<T> {
  next: MonitorRecord | null;
  result: T;
}

export interface UpdateResult<T> {
  record: MonitorRecord;
  result: T;
  committed: boolean;
}

const DEFAULT_MAX_ATTEMPTS = 3;
const DEFAULT_BASE_DELAY_MS = 25;

function throwIfAborted(signal: AbortSignal | undefined): void {
  if (signal?.aborted) {
    throw new DeadlineExceededError();
  }
}

async function backoff(attempt: number, baseDelayMs: number, signal?: AbortSignal): Promise<void> {
  const exponential = baseDelayMs * 2 ** (attempt - 1);
  const delay = exponential / 2 + Math.random() * (exponential / 2);
  try {
    await sleep(delay, undefined, { signal });
  } catch (error) {
    if (signal?.aborted) throw new DeadlineExceededError();
    throw error;
  }
}

/**
 * Run `operation` until it succeeds, retrying retriable store errors with
 * jittered exponential backoff
 *
 * @throws the last error once attempts are exhausted
 * @throws DeadlineExceededError when the signal aborts
 */
export async function withStoreRetry<T>(
  key: MonitorKey,
  operation: () => Promise<T>,
  options: UpdateOptions = {},
): Promise<T> {
  const maxAttempts = options.maxAttempts ?? DEFAULT_MAX_ATTEMPTS;
  const baseDelayMs = options.baseDelayMs ?? DEFAULT_BASE_DELAY_MS;

  for (let attempt = 1; ; attempt++) {
    throwIfAborted(options.signal);

    try {
      return await operation();
    } catch (error) {
      if (!isRetriable(error) || attempt >= maxAttempts) {
        throw error;
      }
      storeRetriesTotal.inc({
        reason: error instanceof CheckInServiceError ? error.code : "UNKNOWN",
      });
      logger.debug(
        { monitor: monitorKeyString(key), attempt, err: error },
        "Retrying store operation",
      );
      await backoff(attempt, baseDelayMs, options.signal);
    }
  }
}

/**
 * Read, decide, compare-and-swap. On a lost race or a store hiccup the record
 * is re-read and `decide` runs again, so a decision made moot by a concurrent
 * writer turns into a no-op.
 *
 * @throws MonitorNotFoundError when the monitor does not exist
 * @throws ConflictError / StoreUnavailableError once attempts are exhausted
 * @throws DeadlineExceededError when the signal aborts
 */
export async function updateMonitor<T>(
  store: MonitorStore,
  key: MonitorKey,
  decide: (current: MonitorRecord) => Decision<T>,
  options: UpdateOptions = {},
): Promise<UpdateResult<T>> {
  return withStoreRetry(
    key,
    async () => {
      const current = await store.get(key);
      if (!current) {
        throw new MonitorNotFoundError(monitorKeyString(key));
      }

      const { next, result } = decide(current);
      if (!next) {
        return { record: current, result, committed: false };
      }

      const pruned =
        options.runRetention !== undefined
          ? { ...next, runs: pruneRuns(next.runs, options.runRetention) }
          : next;
      const record = await store.compareAndSwap(key, current.version, () => pruned);
      return { record, result, committed: true };
    },
    options,
  );
}

function sameSchedule(a: Schedule, b: Schedule): boolean {
  if (a.type === "crontab" && b.type === "crontab") {
    return a.expr === b.expr && a.timezone === b.timezone;
  }
  if (a.type === "interval" && b.type === "interval") {
    return a.value === b.value && a.unit === b.unit && a.timezone === b.timezone;
  }
  return false;
}

export function sameConfig(a: MonitorConfig, b: MonitorConfig): boolean {
  return (
    sameSchedule(a.schedule, b.schedule) &&
    a.checkinMargin === b.checkinMargin &&
    a.maxRuntime === b.maxRuntime &&
    a.failureThreshold === b.failureThreshold &&
    a.recoveryThreshold === b.recoveryThreshold
  );
}

// Occurrences at or before `now` are treated as already examined
function seatSweepCursor(schedule: Schedule, now: Date, anchor: Date): string {
  return (previousExpected(schedule, now, anchor) ?? now).toISOString();
}

export function newMonitorRecord(key: MonitorKey, config: MonitorConfig, now: Date): MonitorRecord {
  const timestamp = now.toISOString();
  return {
    slug: key.slug,
    environment: key.environment,
    config,
    state: {
      status: "up",
      consecutiveFailures: 0,
      consecutiveSuccesses: 0,
    },
    runs: [],
    version: 1,
    createdAt: timestamp,
    updatedAt: timestamp,
    sweptThrough: seatSweepCursor(config.schedule, now, now),
  };
}

/**
 * Create the monitor when absent, otherwise overwrite its config while
 * keeping counters, status and runs. An identical config writes nothing.
 *
 * @throws ValidationError for a schedule the evaluator cannot run
 */
export async function upsertMonitor(
  store: MonitorStore,
  key: MonitorKey,
  config: MonitorConfig,
  now: Date,
  options: UpdateOptions = {},
): Promise<MonitorRecord> {
  validateSchedule(config.schedule);

  const existing = await withStoreRetry(
    key,
    async () =>
      (await store.get(key)) ?? (await store.create(newMonitorRecord(key, config, now))),
    options,
  );
  if (sameConfig(existing.config, config)) {
    return existing;
  }

  const { record } = await updateMonitor(
    store,
    key,
    (current) => {
      if (sameConfig(current.config, config)) {
        return { next: null, result: undefined };
      }

      const scheduleChanged = !sameSchedule(current.config.schedule, config.schedule);
      logger.info(
        { monitor: monitorKeyString(key), scheduleChanged },
        "Updating monitor configuration",
      );

      return {
        next: {
          ...current,
          config,
          updatedAt: now.toISOString(),
          sweptThrough: scheduleChanged
            ? seatSweepCursor(config.schedule, now, new Date(current.createdAt))
            : current.sweptThrough,
        },
        result: undefined,
      };
    },
    options,
  );

  return record;
}
