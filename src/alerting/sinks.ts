import { logger } from "../lib/logger";
import { transitionsTotal } from "../lib/prometheus";
import type { TransitionEvent, TransitionSink } from "./types";

/**
 * Always-on sink: structured log line plus the transitions counter
 */
export function createLoggingSink(): TransitionSink {
  return {
    name: "log",
    async emit(event) {
      transitionsTotal.inc({ environment: event.environment, transition: event.transition });
      const fields = {
        monitor: event.monitorSlug,
        environment: event.environment,
        consecutiveCount: event.consecutiveCount,
        cause: event.cause,
      };
      if (event.transition === "Degraded") {
        logger.warn(fields, "Monitor degraded");
      } else {
        logger.info(fields, "Monitor recovered");
      }
    },
  };
}

/**
 * Collects events in memory
 */
export function createMemorySink(): TransitionSink & { events: TransitionEvent[] } {
  const events: TransitionEvent[] = [];
  return {
    name: "memory",
    events,
    async emit(event) {
      events.push(event);
    },
  };
}

/**
 * Fan out to every sink. One sink failing does not stop the others.
 */
export function combineSinks(sinks: TransitionSink[]): TransitionSink {
  return {
    name: sinks.map((sink) => sink.name).join("+"),
    async emit(event) {
      const results = await Promise.allSettled(sinks.map((sink) => sink.emit(event)));
      results.forEach((result, i) => {
        if (result.status === "rejected") {
          logger.error(
            { sink: sinks[i]?.name, monitor: event.monitorSlug, err: result.reason },
            "Transition sink failed",
          );
        }
      });
    },
  };
}
