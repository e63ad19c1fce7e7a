/**
 * Alert engine - sends transitions directly to Alertmanager
 *
 * Degraded fires an alert, Recovered resolves it. Routing, grouping and
 * delivery channels are configured in Alertmanager itself.
 */

import { logger } from "../lib/logger";
import type { TransitionEvent, TransitionSink } from "./types";

export interface AlertmanagerAlert {
  labels: Record<string, string>;
  annotations: Record<string, string>;
  startsAt: string;
  endsAt?: string;
}

/**
 * Build the Alertmanager v2 payload for a transition
 */
export function buildAlert(event: TransitionEvent): AlertmanagerAlert {
  const monitorId = `${event.environment}/${event.monitorSlug}`;
  const firing = event.transition === "Degraded";
  const timestamp = event.timestamp.toISOString();

  return {
    labels: {
      alertname: "CronMonitorDegraded",
      monitor: event.monitorSlug,
      environment: event.environment,
      severity: "critical",
    },
    annotations: {
      summary: firing ? `${monitorId} is failing` : `${monitorId} recovered`,
      description: firing
        ? `${event.consecutiveCount} consecutive failed runs (last: ${event.cause})`
        : `${event.consecutiveCount} consecutive successful runs`,
    },
    startsAt: timestamp,
    ...(firing ? {} : { endsAt: timestamp }),
  };
}

/**
 * Send a transition to Alertmanager. Failures are logged, never thrown.
 */
export async function sendAlertToAlertmanager(
  alertmanagerUrl: string,
  event: TransitionEvent,
): Promise<void> {
  const monitorId = `${event.environment}/${event.monitorSlug}`;

  try {
    const response = await fetch(`${alertmanagerUrl.replace(/\/$/, "")}/api/v2/alerts`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
      },
      body: JSON.stringify([buildAlert(event)]),
    });

    if (!response.ok) {
      const responseText = await response.text();
      logger.warn(
        {
          monitorId,
          status: response.status,
          response: responseText,
        },
        "Failed to send alert to Alertmanager",
      );
      return;
    }

    logger.info(
      { monitorId, transition: event.transition, alertmanagerUrl },
      "Sent alert to Alertmanager",
    );
  } catch (error) {
    logger.warn(
      { monitorId, transition: event.transition, err: error },
      "Failed to send alert to Alertmanager",
    );
  }
}

export function createAlertmanagerSink(alertmanagerUrl: string): TransitionSink {
  return {
    name: "alertmanager",
    emit: (event) => sendAlertToAlertmanager(alertmanagerUrl, event),
  };
}
