import type { MonitorState, TerminalStatus } from "../types/monitor";
import type { ThresholdResult, Thresholds } from "./types";

/**
 * Apply one terminal run outcome to the monitor's hysteresis counters.
 *
 * A success resets the failure streak and a failure resets the success streak.
 * Status only flips once the streak reaches its threshold, and only from the
 * opposite status, so a transition is reported exactly once per flip.
 */
export function applyOutcome(
  state: MonitorState,
  outcome: TerminalStatus,
  thresholds: Thresholds,
): ThresholdResult {
  if (outcome === "ok") {
    const successes = state.consecutiveSuccesses + 1;
    const recovers = state.status === "down" && successes >= thresholds.recoveryThreshold;
    return {
      state: {
        ...state,
        status: recovers ? "up" : state.status,
        consecutiveSuccesses: successes,
        consecutiveFailures: 0,
      },
      transition: recovers ? "Recovered" : undefined,
      consecutiveCount: successes,
    };
  }

  // error, missed and timeout all count as failures
  const failures = state.consecutiveFailures + 1;
  const degrades = state.status === "up" && failures >= thresholds.failureThreshold;
  return {
    state: {
      ...state,
      status: degrades ? "down" : state.status,
      consecutiveFailures: failures,
      consecutiveSuccesses: 0,
    },
    transition: degrades ? "Degraded" : undefined,
    consecutiveCount: failures,
  };
}
