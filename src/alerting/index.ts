/**
 * Alerting - hysteresis thresholds and transition delivery
 *
 * The threshold engine decides when a monitor flips between up and down;
 * sinks receive the resulting Degraded/Recovered events once committed.
 */

export { buildAlert, createAlertmanagerSink, sendAlertToAlertmanager } from "./alert-engine";
export { combineSinks, createLoggingSink, createMemorySink } from "./sinks";
export { applyOutcome } from "./threshold-engine";
export type {
  ThresholdResult,
  Thresholds,
  Transition,
  TransitionEvent,
  TransitionSink,
} from "./types";
