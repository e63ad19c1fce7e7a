/**
 * Sweep Detector
 *
 * Periodically walks every monitor and closes runs nobody reported on:
 * occurrences with no start inside their margin become Missed, started runs
 * past their max runtime become Timeout. Decisions go through the same
 * compare-and-swap helper as the ingestor, so a check-in that lands first
 * turns the sweep's decision into a no-op.
 */

import { v4 as uuidv4 } from "uuid";
import type { TransitionEvent, TransitionSink } from "../alerting/types";
import { withDeadline } from "../lib/deadline";
import { errorMessage } from "../lib/errors";
import { logger } from "../lib/logger";
import { recordMonitorStatus, sweepDecisionsTotal, sweepDuration } from "../lib/prometheus";
import { inWindow, nextExpected } from "../schedule";
import { MINUTE_MS } from "../schedule/timezone";
import { type Decision, updateMonitor } from "../store/operations";
import { closeRun, isOpen, runAt, transitionEvent } from "../store/runs";
import type { MonitorStore } from "../store/types";
import {
  type MonitorKey,
  type MonitorRecord,
  type Run,
  monitorKeyString,
} from "../types/monitor";
import { createLocalLock, type LeaderLock } from "./lock";

export interface SweepDetectorDeps {
  store: MonitorStore;
  sink: TransitionSink;
  lock?: LeaderLock;
  clock?: () => Date;
  intervalSeconds?: number;
  monitorTimeoutMs?: number;
  maxCatchup?: number;
  casMaxAttempts?: number;
  casBaseDelayMs?: number;
  runRetention?: number;
}

export interface SweepReport {
  monitors: number;
  missed: number;
  timedOut: number;
  failed: number;
}

interface SweepDecision {
  closed: Array<{ run: Run; transition?: TransitionEvent }>;
}

/**
 * Decide Missed and Timeout closures for one monitor at `now`
 */
export function decideSweep(
  current: MonitorRecord,
  now: Date,
  maxCatchup: number,
): Decision<SweepDecision> {
  const { schedule, checkinMargin, maxRuntime } = current.config;
  const anchor = new Date(current.createdAt);
  const closed: SweepDecision["closed"] = [];
  let record = current;

  // Missed: occurrences after the cursor whose margin has fully elapsed
  let cursor = new Date(current.sweptThrough);
  for (let i = 0; i < maxCatchup; i++) {
    const expected = nextExpected(schedule, cursor, anchor);
    if (!expected || inWindow(schedule, expected, checkinMargin, now) !== "missed") break;
    cursor = expected;

    const expectedAt = expected.toISOString();
    if (runAt(record, expectedAt)) continue;

    const run: Run = { runId: uuidv4(), expectedAt, checkinMargin, maxRuntime };
    const result = closeRun(record, run, "missed", now, undefined, now);
    record = result.record;
    closed.push({
      run: result.run,
      transition: transitionEvent(record, result.threshold, "missed", now),
    });
  }

  const cursorMoved = cursor.toISOString() !== current.sweptThrough;
  if (cursorMoved) {
    record = { ...record, sweptThrough: cursor.toISOString(), updatedAt: now.toISOString() };
  }

  // Timeout: started runs past the max runtime captured when they were created
  for (const run of record.runs) {
    if (!isOpen(run) || run.startedAt === undefined || run.maxRuntime <= 0) continue;

    const startedAt = new Date(run.startedAt).getTime();
    if (now.getTime() <= startedAt + run.maxRuntime * MINUTE_MS) continue;

    const result = closeRun(record, run, "timeout", now, (now.getTime() - startedAt) / 1000, now);
    record = result.record;
    closed.push({
      run: result.run,
      transition: transitionEvent(record, result.threshold, "timeout", now),
    });
  }

  if (closed.length === 0 && !cursorMoved) {
    return { next: null, result: { closed } };
  }
  return { next: record, result: { closed } };
}

export function createSweepDetector(deps: SweepDetectorDeps) {
  const lock = deps.lock ?? createLocalLock();
  const clock = deps.clock ?? (() => new Date());
  const intervalMs = (deps.intervalSeconds ?? 30) * 1000;
  const monitorTimeoutMs = deps.monitorTimeoutMs ?? 5000;
  const maxCatchup = deps.maxCatchup ?? 60;

  let running = false;
  let timer: NodeJS.Timeout | null = null;
  // The tick in progress, lock acquisition included
  let pending: Promise<void> | null = null;

  async function sweepMonitor(key: MonitorKey, now: Date, signal: AbortSignal) {
    const { record, result, committed } = await updateMonitor(
      deps.store,
      key,
      (current) => decideSweep(current, now, maxCatchup),
      {
        maxAttempts: deps.casMaxAttempts,
        baseDelayMs: deps.casBaseDelayMs,
        runRetention: deps.runRetention,
        signal,
      },
    );
    if (!committed) return [];

    recordMonitorStatus(record.slug, record.environment, record.state.status);
    for (const { run, transition } of result.closed) {
      sweepDecisionsTotal.inc({
        environment: record.environment,
        status: run.terminalStatus ?? "unknown",
      });
      logger.info(
        {
          monitor: monitorKeyString(record),
          runId: run.runId,
          expectedAt: run.expectedAt,
          status: run.terminalStatus,
        },
        "Sweep closed run",
      );
      if (transition) {
        await deps.sink.emit(transition);
      }
    }
    return result.closed;
  }

  /**
   * One pass over every monitor. A monitor that fails or exceeds its time
   * budget is logged and skipped.
   */
  async function runOnce(now: Date = clock()): Promise<SweepReport> {
    const report: SweepReport = { monitors: 0, missed: 0, timedOut: 0, failed: 0 };
    const endTimer = sweepDuration.startTimer();

    let monitors: MonitorRecord[];
    try {
      monitors = await deps.store.list();
    } catch (error) {
      logger.error({ err: error }, "Sweep could not list monitors");
      endTimer();
      report.failed = 1;
      return report;
    }

    for (const monitor of monitors) {
      report.monitors++;
      const key: MonitorKey = { slug: monitor.slug, environment: monitor.environment };
      const signal = AbortSignal.timeout(monitorTimeoutMs);

      try {
        const closed = await withDeadline(
          sweepMonitor(key, now, signal),
          signal,
          `Sweep of ${monitorKeyString(key)}`,
        );
        for (const { run } of closed) {
          if (run.terminalStatus === "missed") report.missed++;
          if (run.terminalStatus === "timeout") report.timedOut++;
        }
      } catch (error) {
        report.failed++;
        logger.error(
          { monitor: monitorKeyString(key), error: errorMessage(error) },
          "Sweep of monitor failed",
        );
      }
    }

    endTimer();
    logger.debug({ ...report }, "Sweep pass finished");
    return report;
  }

  async function tick(): Promise<void> {
    if (!running) return;

    try {
      // stop() may have been called while the lock was being acquired
      if ((await lock.acquire()) && running) {
        await runOnce();
      }
    } catch (error) {
      logger.error({ err: error }, "Sweep loop error");
    }

    // Schedule next iteration
    if (running) {
      timer = setTimeout(() => {
        pending = tick();
      }, intervalMs);
    }
  }

  return {
    runOnce,

    start(): void {
      if (running) return;
      running = true;
      logger.info({ intervalMs, lock: lock.name }, "Starting sweep detector...");
      pending = tick();
    },

    async stop(): Promise<void> {
      if (!running) return;
      logger.info("Stopping sweep detector...");
      running = false;

      if (timer) {
        clearTimeout(timer);
        timer = null;
      }
      if (pending) {
        await pending;
        pending = null;
      }
      await lock.release();
      logger.info("Sweep detector stopped");
    },

    isRunning(): boolean {
      return running;
    },
  };
}

export type SweepDetector = ReturnType<typeof createSweepDetector>;
