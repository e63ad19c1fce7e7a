/**
 * Core types for monitor transitions
 */

import type { MonitorState, TerminalStatus } from "../types/monitor";

export type Transition = "Degraded" | "Recovered";

/**
 * Alert-worthy change of a monitor's status. Only Degraded and Recovered are
 * emitted; every other outcome just moves the counters.
 */
export interface TransitionEvent {
  monitorSlug: string;
  environment: string;
  transition: Transition;
  consecutiveCount: number;
  timestamp: Date;
  /** Outcome that caused the transition */
  cause: TerminalStatus;
}

export interface Thresholds {
  failureThreshold: number;
  recoveryThreshold: number;
}

export interface ThresholdResult {
  state: MonitorState;
  transition?: Transition;
  consecutiveCount: number;
}

/**
 * Receives transitions after the state change that produced them has been
 * committed. Implementations must not throw for delivery failures.
 */
export interface TransitionSink {
  readonly name: string;
  emit(event: TransitionEvent): Promise<void>;
}
