/**
 * Read-only monitor endpoints
 */

import { MonitorNotFoundError } from "../../lib/errors";
import type { MonitorStore } from "../../store/types";
import { type MonitorRecord, monitorKeyString } from "../../types/monitor";
import {
  CheckInsQuerySchema,
  MonitorParamsSchema,
  MonitorQuerySchema,
} from "../../types/schemas/checkins";
import type { ServerInstance } from "../types";

function summarize(record: MonitorRecord) {
  const { runs: _runs, ...rest } = record;
  return rest;
}

export async function registerMonitorRoutes(
  app: ServerInstance,
  deps: { store: MonitorStore },
): Promise<void> {
  const { store } = deps;

  /**
   * GET /monitors
   * Every monitor without its runs
   */
  app.get("/monitors", async () => {
    const monitors = await store.list();
    const items = monitors
      .map(summarize)
      .sort((a, b) => monitorKeyString(a).localeCompare(monitorKeyString(b)));
    return { items, total: items.length };
  });

  /**
   * GET /monitors/:slug?environment=
   */
  app.get("/monitors/:slug", async (request) => {
    const { slug } = MonitorParamsSchema.parse(request.params);
    const { environment } = MonitorQuerySchema.parse(request.query);

    const record = await store.get({ slug, environment });
    if (!record) {
      throw new MonitorNotFoundError(monitorKeyString({ slug, environment }));
    }
    return record;
  });

  /**
   * GET /monitors/:slug/checkins?environment=&limit=
   * Audit log, newest first
   */
  app.get("/monitors/:slug/checkins", async (request) => {
    const { slug } = MonitorParamsSchema.parse(request.params);
    const { environment, limit } = CheckInsQuerySchema.parse(request.query);

    const key = { slug, environment };
    if (!(await store.get(key))) {
      throw new MonitorNotFoundError(monitorKeyString(key));
    }
    const items = await store.listCheckIns(key, limit);
    return { items, total: items.length };
  });
}
