import Fastify, { type FastifyError } from "fastify";
import { ZodError } from "zod";
import type { Ingestor } from "../ingest/ingestor";
import { CheckInServiceError, RateLimitedError, ValidationError } from "../lib/errors";
import { logger } from "../lib/logger";
import type { MonitorStore } from "../store/types";
import { registerCheckInRoutes } from "./routes/checkins";
import { registerMonitorRoutes } from "./routes/monitors";

export interface AppDeps {
  store: MonitorStore;
  ingestor: Ingestor;
  ingestDeadlineMs: number;
  clock?: () => Date;
  /** Readiness probe; defaults to always ready */
  isReady?: () => boolean;
}

export async function createApp(deps: AppDeps) {
  const app = Fastify({
    loggerInstance: logger,
    trustProxy: true,
  });

  // Global error handler: service errors carry their own status
  app.setErrorHandler<FastifyError>((error, request, reply) => {
    if (error instanceof ZodError) {
      return reply.status(400).send({
        error: "Validation failed",
        code: "VALIDATION_ERROR",
        issues: error.issues.map((issue) => ({
          path: issue.path.join("."),
          message: issue.message,
          code: issue.code,
        })),
      });
    }

    if (error instanceof CheckInServiceError) {
      if (error instanceof RateLimitedError) {
        reply.header("Retry-After", Math.max(1, Math.ceil(error.retryAfterMs / 1000)));
      }
      if (error.statusCode >= 500) {
        logger.warn(
          { code: error.code, url: request.url, err: error },
          "Check-in service unavailable",
        );
      }
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
        ...(error instanceof ValidationError && { issues: error.issues }),
      });
    }

    // Malformed JSON, unsupported media type and similar client errors
    if (typeof error.statusCode === "number" && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        error: error.message,
        code: error.code,
      });
    }

    logger.error({ error, url: request.url, method: request.method }, "Unhandled error");

    return reply.status(500).send({
      error: "Internal server error",
      code: "INTERNAL_ERROR",
    });
  });

  // Health check endpoints
  app.get("/health", async () => ({
    status: "ok",
    timestamp: new Date().toISOString(),
  }));

  app.get("/ready", async (_request, reply) => {
    const ready = deps.isReady?.() ?? true;
    return reply.status(ready ? 200 : 503).send({
      ready,
      timestamp: new Date().toISOString(),
    });
  });

  await registerCheckInRoutes(app, deps);
  await registerMonitorRoutes(app, deps);

  app.setNotFoundHandler(async (_request, reply) => {
    return reply.code(404).send({ error: "Not found", code: "NOT_FOUND" });
  });

  return app;
}

export type FastifyApp = Awaited<ReturnType<typeof createApp>>;
