import type { Config } from "../lib/config";
import { logger } from "../lib/logger";
import { createEtcdStore } from "./etcd-store";
import { createMemoryStore } from "./memory-store";
import { createSqliteStore } from "./sqlite-store";
import type { MonitorStore } from "./types";

/**
 * Open the store selected by STORE_TYPE
 */
export async function createStore(cfg: Config): Promise<MonitorStore> {
  logger.info({ storeType: cfg.storeType }, "Opening monitor store...");

  switch (cfg.storeType) {
    case "memory":
      return createMemoryStore({ checkInRetention: cfg.checkInRetention });
    case "sqlite":
      return createSqliteStore(cfg.databaseUrl);
    case "etcd":
      return createEtcdStore({ endpoints: cfg.etcdEndpoints, prefix: cfg.etcdPrefix });
    default: {
      // Ensure all cases are handled
      const exhaustive: never = cfg.storeType;
      throw new Error(`Unknown store type: ${exhaustive}`);
    }
  }
}

export { createEtcdStore } from "./etcd-store";
export { createMemoryStore } from "./memory-store";
export {
  type Decision,
  newMonitorRecord,
  sameConfig,
  type UpdateOptions,
  type UpdateResult,
  updateMonitor,
  upsertMonitor,
} from "./operations";
export {
  closeRun,
  isOpen,
  latestOpenRun,
  pruneRuns,
  runAt,
  runById,
  transitionEvent,
  withRun,
} from "./runs";
export { createSqliteStore } from "./sqlite-store";
export type { MonitorStore, Mutation } from "./types";
