/**
 * Minimal HTTP server for Prometheus metrics scraping
 *
 * Runs on its own port so scrapes never compete with check-in traffic.
 */

import { createServer } from "node:http";
import { logger } from "../lib/logger";
import { getMetrics, getRegistry } from "../lib/prometheus";

export interface MetricsServerConfig {
  port: number;
  host: string;
}

export function createMetricsServer(config: MetricsServerConfig) {
  const server = createServer((req, res) => {
    const path = req.url?.split("?")[0];

    if (req.method === "GET" && path === "/metrics") {
      getMetrics().then(
        (metrics) => {
          res.writeHead(200, { "Content-Type": getRegistry().contentType });
          res.end(metrics);
        },
        (error: unknown) => {
          logger.error({ error }, "Failed to generate metrics");
          res.writeHead(500);
          res.end("Internal Server Error\n");
        },
      );
      return;
    }

    if (path === "/healthz") {
      res.writeHead(200, { "Content-Type": "text/plain" });
      res.end("OK\n");
      return;
    }

    res.writeHead(404, { "Content-Type": "text/plain" });
    res.end("Not Found\n");
  });

  let listening = false;

  return {
    start(): Promise<void> {
      return new Promise((resolve, reject) => {
        server.once("error", reject);
        server.listen(config.port, config.host, () => {
          server.off("error", reject);
          logger.info({ port: config.port, host: config.host }, "Metrics server started");
          listening = true;
          resolve();
        });
      });
    },

    stop(): Promise<void> {
      return new Promise((resolve) => {
        if (!listening) {
          resolve();
          return;
        }

        server.close(() => {
          listening = false;
          logger.info("Metrics server stopped");
          resolve();
        });
      });
    },
  };
}

export type MetricsServer = ReturnType<typeof createMetricsServer>;
