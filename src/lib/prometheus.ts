/**
 * Prometheus Metrics Export
 *
 * Check-in throughput, CAS contention, sweep decisions and monitor status,
 * scraped from the metrics server.
 */

import { Counter, collectDefaultMetrics, Gauge, Histogram, Registry } from "prom-client";

const registry = new Registry();

// Collect default Node.js metrics (CPU, memory, etc.)
collectDefaultMetrics({ register: registry });

/**
 * Accepted check-ins by wire status and ingestor outcome
 */
export const checkInsTotal = new Counter({
  name: "cronsentinel_checkins_total",
  help: "Check-ins accepted by the ingestor",
  labelNames: ["environment", "status", "outcome"] as const,
  registers: [registry],
});

/**
 * Check-ins dropped by the rate limiter (never stored, never retried)
 */
export const rateLimitedTotal = new Counter({
  name: "cronsentinel_checkins_rate_limited_total",
  help: "Check-ins rejected by the per-monitor rate limiter",
  labelNames: ["environment"] as const,
  registers: [registry],
});

/**
 * Monitor updates retried after a lost compare-and-swap or a store failure
 */
export const storeRetriesTotal = new Counter({
  name: "cronsentinel_store_retries_total",
  help: "Monitor updates retried by the compare-and-swap helper",
  labelNames: ["reason"] as const,
  registers: [registry],
});

export const sweepDecisionsTotal = new Counter({
  name: "cronsentinel_sweep_decisions_total",
  help: "Runs closed by the sweep detector",
  labelNames: ["environment", "status"] as const,
  registers: [registry],
});

export const transitionsTotal = new Counter({
  name: "cronsentinel_transitions_total",
  help: "Degraded and Recovered transitions emitted",
  labelNames: ["environment", "transition"] as const,
  registers: [registry],
});

/**
 * Monitor status (0 = down, 1 = up)
 */
export const monitorStatus = new Gauge({
  name: "cronsentinel_monitor_status",
  help: "Current monitor status (0=down, 1=up)",
  labelNames: ["monitor", "environment"] as const,
  registers: [registry],
});

export const sweepDuration = new Histogram({
  name: "cronsentinel_sweep_duration_seconds",
  help: "Time taken by one sweep pass",
  buckets: [0.01, 0.05, 0.1, 0.5, 1, 5, 10, 30],
  registers: [registry],
});

/**
 * Get metrics endpoint for Prometheus scraping
 * @returns Prometheus metrics in text format
 */
export async function getMetrics(): Promise<string> {
  return await registry.metrics();
}

export function getRegistry(): Registry {
  return registry;
}

export function recordMonitorStatus(
  slug: string,
  environment: string,
  status: "up" | "down",
): void {
  monitorStatus.set({ monitor: slug, environment }, status === "up" ? 1 : 0);
}
