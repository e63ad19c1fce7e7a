/**
 * cronsentinel main entry point
 *
 * Check-in API, sweep detector and metrics server over one monitor store.
 */

import { combineSinks, createAlertmanagerSink, createLoggingSink } from "./alerting";
import type { TransitionSink } from "./alerting/types";
import { createIngestor } from "./ingest/ingestor";
import { config, validateConfig } from "./lib/config";
import { getCoordinationApiClient } from "./lib/k8s-client";
import { logger } from "./lib/logger";
import { createRateLimiter } from "./ratelimit/rate-limiter";
import { createApp, type FastifyApp } from "./server/app";
import { createMetricsServer, type MetricsServer } from "./server/metrics-server";
import { createStore } from "./store";
import type { MonitorStore } from "./store/types";
import {
  createLeaseLock,
  createLocalLock,
  createSweepDetector,
  type LeaderLock,
  type SweepDetector,
} from "./sweep";

let store: MonitorStore | null = null;
let app: FastifyApp | null = null;
let sweep: SweepDetector | null = null;
let metricsServer: MetricsServer | null = null;
let shuttingDown = false;

function createSink(): TransitionSink {
  const sinks: TransitionSink[] = [createLoggingSink()];
  if (config.alertmanagerUrl) {
    sinks.push(createAlertmanagerSink(config.alertmanagerUrl));
  }
  return combineSinks(sinks);
}

function createLock(): LeaderLock {
  switch (config.leaderElection) {
    case "none":
      return createLocalLock();
    case "kubernetes":
      return createLeaseLock({
        api: getCoordinationApiClient(),
        namespace: config.kubeNamespace,
        leaseName: config.leaseName,
        holderIdentity: config.holderIdentity,
        // Outlive at least a few missed renewals
        leaseDurationSeconds: Math.max(30, 3 * config.sweepIntervalSeconds),
      });
    default: {
      // Ensure all cases are handled
      const exhaustive: never = config.leaderElection;
      throw new Error(`Unknown leader election mode: ${exhaustive}`);
    }
  }
}

async function main() {
  validateConfig();

  store = await createStore(config);
  const sink = createSink();
  const casOptions = {
    casMaxAttempts: config.casMaxAttempts,
    casBaseDelayMs: config.casBaseDelayMs,
    runRetention: config.runRetention,
  };

  const ingestor = createIngestor({
    store,
    sink,
    rateLimiter: createRateLimiter({
      max: config.rateLimitMax,
      windowMs: config.rateLimitWindowSeconds * 1000,
    }),
    ...casOptions,
  });

  sweep = createSweepDetector({
    store,
    sink,
    lock: createLock(),
    intervalSeconds: config.sweepIntervalSeconds,
    monitorTimeoutMs: config.sweepMonitorTimeoutMs,
    maxCatchup: config.sweepMaxCatchup,
    ...casOptions,
  });

  app = await createApp({
    store,
    ingestor,
    ingestDeadlineMs: config.ingestDeadlineMs,
    isReady: () => !shuttingDown,
  });
  await app.listen({ port: config.port, host: config.host });

  // Start metrics server for Prometheus scraping
  metricsServer = createMetricsServer({ port: config.metricsPort, host: config.host });
  await metricsServer.start();

  sweep.start();

  logger.info(
    {
      port: config.port,
      metricsPort: config.metricsPort,
      storeType: config.storeType,
      env: config.env,
    },
    "cronsentinel started",
  );
}

// Handle graceful shutdown
async function gracefulShutdown(signal: string): Promise<void> {
  if (shuttingDown) return;
  shuttingDown = true;
  logger.info({ signal }, "Shutting down gracefully...");

  try {
    if (app) await app.close();
    if (sweep) await sweep.stop();
    if (metricsServer) await metricsServer.stop();
    if (store) await store.close();
  } catch (error) {
    logger.error({ err: error }, "Error during shutdown");
    process.exit(1);
  }

  logger.info("Shutdown complete");
  process.exit(0);
}

process.on("SIGINT", () => {
  void gracefulShutdown("SIGINT");
});
process.on("SIGTERM", () => {
  void gracefulShutdown("SIGTERM");
});

// Start the app
main().catch((error: unknown) => {
  logger.error({ err: error }, "Fatal error during startup");
  process.exit(1);
});
