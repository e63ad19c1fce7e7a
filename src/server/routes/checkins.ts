/**
 * Check-in ingestion route
 */

import type { Ingestor } from "../../ingest/ingestor";
import { withDeadline } from "../../lib/deadline";
import {
  CheckInBodySchema,
  MonitorParamsSchema,
  toCheckIn,
  toMonitorConfig,
} from "../../types/schemas/checkins";
import type { ServerInstance } from "../types";

export interface CheckInRouteDeps {
  ingestor: Ingestor;
  ingestDeadlineMs: number;
  clock?: () => Date;
}

export async function registerCheckInRoutes(
  app: ServerInstance,
  deps: CheckInRouteDeps,
): Promise<void> {
  const clock = deps.clock ?? (() => new Date());

  /**
   * POST /monitors/:slug/checkins
   * Accepts a start, finish or heartbeat check-in, upserting the monitor
   * when a monitor_config is attached
   */
  app.post("/monitors/:slug/checkins", async (request, reply) => {
    const { slug } = MonitorParamsSchema.parse(request.params);
    const body = CheckInBodySchema.parse(request.body);

    const signal = AbortSignal.timeout(deps.ingestDeadlineMs);
    const result = await withDeadline(
      deps.ingestor.ingest(
        toCheckIn(slug, body, clock()),
        body.monitor_config ? toMonitorConfig(body.monitor_config) : undefined,
        { signal },
      ),
      signal,
      "Check-in ingestion",
    );

    return reply.status(202).send({ check_in_id: result.checkInId });
  });
}
