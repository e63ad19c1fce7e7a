/**
 * Run bookkeeping inside a monitor record
 *
 * Pure helpers shared by the ingestor and the sweep detector. They return new
 * records and never write to the store themselves.
 */

import { applyOutcome } from "../alerting/threshold-engine";
import type { ThresholdResult, TransitionEvent } from "../alerting/types";
import type { MonitorRecord, Run, TerminalStatus } from "../types/monitor";

export function isOpen(run: Run): boolean {
  return run.terminalStatus === undefined;
}

export function runAt(record: MonitorRecord, expectedAt: string): Run | undefined {
  return record.runs.find((run) => run.expectedAt === expectedAt);
}

export function runById(record: MonitorRecord, runId: string): Run | undefined {
  return record.runs.find((run) => run.runId === runId);
}

/**
 * The open, started run with the latest expected time
 */
export function latestOpenRun(record: MonitorRecord): Run | undefined {
  let latest: Run | undefined;
  for (const run of record.runs) {
    if (!isOpen(run) || run.startedAt === undefined) continue;
    if (!latest || run.expectedAt > latest.expectedAt) latest = run;
  }
  return latest;
}

function byExpectedAt(a: Run, b: Run): number {
  return a.expectedAt.localeCompare(b.expectedAt);
}

/**
 * Insert or replace `run` (matched on runId and expectedAt) and move the
 * last-run pointers forward when it is the newest occurrence.
 */
export function withRun(record: MonitorRecord, run: Run, now: Date): MonitorRecord {
  const others = record.runs.filter(
    (existing) => !(existing.runId === run.runId && existing.expectedAt === run.expectedAt),
  );
  const isNewest =
    record.state.lastExpectedRunAt === undefined || run.expectedAt >= record.state.lastExpectedRunAt;

  return {
    ...record,
    runs: [...others, run].sort(byExpectedAt),
    state: isNewest
      ? { ...record.state, lastExpectedRunAt: run.expectedAt, lastRunId: run.runId }
      : record.state,
    updatedAt: now.toISOString(),
  };
}

export interface ClosedRun {
  record: MonitorRecord;
  run: Run;
  threshold: ThresholdResult;
}

/**
 * Give `run` its terminal status and feed the outcome to the threshold engine
 */
export function closeRun(
  record: MonitorRecord,
  run: Run,
  status: TerminalStatus,
  finishedAt: Date,
  durationSeconds: number | undefined,
  now: Date,
): ClosedRun {
  const closed: Run = {
    ...run,
    finishedAt: finishedAt.toISOString(),
    terminalStatus: status,
    ...(durationSeconds !== undefined && { durationSeconds }),
  };

  const updated = withRun(record, closed, now);
  const threshold = applyOutcome(updated.state, status, updated.config);

  return {
    record: { ...updated, state: threshold.state },
    run: closed,
    threshold,
  };
}

/**
 * Keep every open run plus the most recent `retention` terminal runs
 */
export function pruneRuns(runs: Run[], retention: number): Run[] {
  const terminal = runs.filter((run) => !isOpen(run));
  if (terminal.length <= retention) return [...runs].sort(byExpectedAt);

  const keep = new Set(terminal.sort(byExpectedAt).slice(-retention));
  return runs.filter((run) => isOpen(run) || keep.has(run)).sort(byExpectedAt);
}

export function transitionEvent(
  record: MonitorRecord,
  threshold: ThresholdResult,
  cause: TerminalStatus,
  timestamp: Date,
): TransitionEvent | undefined {
  if (!threshold.transition) return undefined;
  return {
    monitorSlug: record.slug,
    environment: record.environment,
    transition: threshold.transition,
    consecutiveCount: threshold.consecutiveCount,
    timestamp,
    cause,
  };
}
