/**
 * Check-In Ingestor
 *
 * Correlates start/finish check-ins into runs and advances the monitor's
 * thresholds. Every state change is one compare-and-swap on the monitor
 * record; transitions are handed to the sink only after that write commits.
 */

import { v4 as uuidv4 } from "uuid";
import type { TransitionEvent, TransitionSink } from "../alerting/types";
import { RateLimitedError, ValidationError } from "../lib/errors";
import { logger } from "../lib/logger";
import { checkInsTotal, rateLimitedTotal, recordMonitorStatus } from "../lib/prometheus";
import type { RateLimiter } from "../ratelimit/rate-limiter";
import { resolveExpectedAt } from "../schedule";
import { type Decision, updateMonitor, upsertMonitor } from "../store/operations";
import {
  closeRun,
  latestOpenRun,
  runAt,
  runById,
  transitionEvent,
  withRun,
} from "../store/runs";
import type { MonitorStore } from "../store/types";
import {
  type CheckIn,
  type CheckInOutcome,
  type MonitorConfig,
  type MonitorKey,
  type MonitorRecord,
  type Run,
  type TerminalStatus,
  monitorKeyString,
} from "../types/monitor";

export interface IngestorDeps {
  store: MonitorStore;
  rateLimiter: RateLimiter;
  sink: TransitionSink;
  clock?: () => Date;
  casMaxAttempts?: number;
  casBaseDelayMs?: number;
  runRetention?: number;
}

export interface IngestOptions {
  signal?: AbortSignal;
}

export interface IngestResult {
  /** The client's check-in id, or the id synthesized for a heartbeat */
  checkInId: string;
  runId: string;
  expectedAt: string;
  outcome: CheckInOutcome;
  transition?: TransitionEvent;
}

interface RunDecision {
  outcome: CheckInOutcome;
  run: Run;
  transition?: TransitionEvent;
}

function noWrite(outcome: CheckInOutcome, run: Run): Decision<RunDecision> {
  return { next: null, result: { outcome, run } };
}

function startDecision(
  current: MonitorRecord,
  checkIn: CheckIn,
  checkInId: string,
  now: Date,
): Decision<RunDecision> {
  // The same check-in resent
  const own = runById(current, checkInId);
  if (own) return noWrite(own.terminalStatus ? "late" : "duplicate", own);

  const { schedule, checkinMargin, maxRuntime } = current.config;
  const expectedAt = resolveExpectedAt(
    schedule,
    checkIn.timestamp,
    new Date(current.createdAt),
    checkinMargin,
  ).toISOString();

  const existing = runAt(current, expectedAt);
  if (existing?.terminalStatus) return noWrite("late", existing);
  if (existing?.startedAt) return noWrite("duplicate", existing);

  const run: Run = existing
    ? { ...existing, startedAt: checkIn.timestamp.toISOString() }
    : {
        runId: checkInId,
        expectedAt,
        startedAt: checkIn.timestamp.toISOString(),
        checkinMargin,
        maxRuntime,
      };

  return { next: withRun(current, run, now), result: { outcome: "started", run } };
}

function finishDecision(
  current: MonitorRecord,
  checkIn: CheckIn,
  status: TerminalStatus,
  now: Date,
): Decision<RunDecision> {
  const byId = checkIn.checkInId ? runById(current, checkIn.checkInId) : undefined;

  // First terminal write wins; a late finish is audit only
  if (byId?.terminalStatus) return noWrite("late", byId);

  // An id nobody started is a heartbeat, never another client's run
  const target = checkIn.checkInId === undefined ? latestOpenRun(current) : byId;
  if (target) {
    const startedAt = target.startedAt ? new Date(target.startedAt).getTime() : undefined;
    const duration =
      checkIn.durationSeconds ??
      (startedAt !== undefined ? (checkIn.timestamp.getTime() - startedAt) / 1000 : undefined);

    const closed = closeRun(current, target, status, checkIn.timestamp, duration, now);
    return {
      next: closed.record,
      result: {
        outcome: "completed",
        run: closed.run,
        transition: transitionEvent(closed.record, closed.threshold, status, now),
      },
    };
  }

  // Heartbeat: open and close a run for the occurrence in one write
  const { schedule, checkinMargin, maxRuntime } = current.config;
  const expectedAt = resolveExpectedAt(
    schedule,
    checkIn.timestamp,
    new Date(current.createdAt),
    checkinMargin,
  ).toISOString();

  const existing = runAt(current, expectedAt);
  if (existing?.terminalStatus) return noWrite("late", existing);
  // Another client's run already owns this occurrence
  if (existing) return noWrite("duplicate", existing);

  const startedAt =
    checkIn.durationSeconds !== undefined
      ? new Date(checkIn.timestamp.getTime() - checkIn.durationSeconds * 1000)
      : checkIn.timestamp;

  const opened: Run = {
    runId: checkIn.checkInId ?? uuidv4(),
    expectedAt,
    startedAt: startedAt.toISOString(),
    checkinMargin,
    maxRuntime,
  };

  const closed = closeRun(current, opened, status, checkIn.timestamp, checkIn.durationSeconds, now);
  return {
    next: closed.record,
    result: {
      outcome: "heartbeat",
      run: closed.run,
      transition: transitionEvent(closed.record, closed.threshold, status, now),
    },
  };
}

/**
 * Pick the decision for a check-in's status
 * @throws ValidationError for an in_progress check-in without an id
 */
function decisionFor(
  checkIn: CheckIn,
  now: Date,
): (current: MonitorRecord) => Decision<RunDecision> {
  const { status, checkInId } = checkIn;
  if (status === "in_progress") {
    if (!checkInId) {
      throw new ValidationError("check_in_id is required for in_progress check-ins", [
        { path: "check_in_id", message: "Required for in_progress" },
      ]);
    }
    return (current) => startDecision(current, checkIn, checkInId, now);
  }
  return (current) => finishDecision(current, checkIn, status, now);
}

export function createIngestor(deps: IngestorDeps) {
  const clock = deps.clock ?? (() => new Date());

  async function resolveMonitor(
    key: MonitorKey,
    monitorConfig: MonitorConfig | undefined,
    now: Date,
    signal: AbortSignal | undefined,
  ): Promise<void> {
    const options = {
      maxAttempts: deps.casMaxAttempts,
      baseDelayMs: deps.casBaseDelayMs,
      signal,
    };
    if (monitorConfig) {
      await upsertMonitor(deps.store, key, monitorConfig, now, options);
      return;
    }

    // Read-only round: retries store failures, throws MonitorNotFoundError when absent
    await updateMonitor(deps.store, key, () => ({ next: null, result: undefined }), options);
  }

  /**
   * Ingest one check-in, optionally upserting the monitor first
   *
   * @throws ValidationError for an in_progress check-in without an id or a bad schedule
   * @throws MonitorNotFoundError when the monitor is unknown and no config was sent
   * @throws RateLimitedError when the monitor exceeded its quota (nothing is stored)
   * @throws ConflictError / StoreUnavailableError once store retries are exhausted
   * @throws DeadlineExceededError when the signal aborts
   */
  async function ingest(
    checkIn: CheckIn,
    monitorConfig?: MonitorConfig,
    options: IngestOptions = {},
  ): Promise<IngestResult> {
    const key: MonitorKey = { slug: checkIn.slug, environment: checkIn.environment };
    const id = monitorKeyString(key);
    const now = clock();

    const decide = decisionFor(checkIn, now);

    await resolveMonitor(key, monitorConfig, now, options.signal);

    const limit = deps.rateLimiter.tryAcquire(id, now);
    if (!limit.allowed) {
      rateLimitedTotal.inc({ environment: key.environment });
      logger.info({ monitor: id, retryAfterMs: limit.retryAfterMs }, "Check-in rate limited");
      throw new RateLimitedError(id, limit.retryAfterMs);
    }

    const { record, result, committed } = await updateMonitor(
      deps.store,
      key,
      decide,
      {
        maxAttempts: deps.casMaxAttempts,
        baseDelayMs: deps.casBaseDelayMs,
        runRetention: deps.runRetention,
        signal: options.signal,
      },
    );

    const transition = committed ? result.transition : undefined;
    if (committed) {
      recordMonitorStatus(record.slug, record.environment, record.state.status);
    }
    if (transition) {
      await deps.sink.emit(transition);
    }

    const checkInId = checkIn.checkInId ?? result.run.runId;
    await deps.store.appendCheckIn({
      id: uuidv4(),
      checkInId,
      slug: key.slug,
      environment: key.environment,
      status: checkIn.status,
      timestamp: checkIn.timestamp.toISOString(),
      durationSeconds: checkIn.durationSeconds,
      runId: result.run.runId,
      outcome: result.outcome,
      receivedAt: now.toISOString(),
    });

    checkInsTotal.inc({
      environment: key.environment,
      status: checkIn.status,
      outcome: result.outcome,
    });
    logger.debug(
      { monitor: id, checkInId, runId: result.run.runId, outcome: result.outcome },
      "Check-in ingested",
    );

    return {
      checkInId,
      runId: result.run.runId,
      expectedAt: result.run.expectedAt,
      outcome: result.outcome,
      transition,
    };
  }

  return { ingest };
}

export type Ingestor = ReturnType<typeof createIngestor>;
