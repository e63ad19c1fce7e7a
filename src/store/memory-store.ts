import { ConflictError } from "../lib/errors";
import {
  type CheckInEntry,
  type MonitorKey,
  type MonitorRecord,
  monitorKeyString,
} from "../types/monitor";
import type { MonitorStore, Mutation } from "./types";

export interface MemoryStoreOptions {
  /** Audit entries kept per monitor; older ones are dropped */
  checkInRetention?: number;
}

const DEFAULT_CHECKIN_RETENTION = 1000;

/**
 * In-process store for tests and single-node development.
 * Records are cloned on the way in and out so callers never share state.
 */
export function createMemoryStore(options: MemoryStoreOptions = {}): MonitorStore {
  const checkInRetention = options.checkInRetention ?? DEFAULT_CHECKIN_RETENTION;
  const monitors = new Map<string, MonitorRecord>();
  const checkIns = new Map<string, CheckInEntry[]>();

  return {
    async get(key: MonitorKey) {
      const record = monitors.get(monitorKeyString(key));
      return record ? structuredClone(record) : null;
    },

    async list() {
      return [...monitors.values()].map((record) => structuredClone(record));
    },

    async create(record: MonitorRecord) {
      const id = monitorKeyString(record);
      const existing = monitors.get(id);
      if (existing) return structuredClone(existing);

      monitors.set(id, structuredClone(record));
      return structuredClone(record);
    },

    async compareAndSwap(key: MonitorKey, expectedVersion: number, mutation: Mutation) {
      const id = monitorKeyString(key);
      const current = monitors.get(id);
      if (!current || current.version !== expectedVersion) {
        throw new ConflictError(id, expectedVersion, current?.version ?? null);
      }

      const next: MonitorRecord = {
        ...mutation(structuredClone(current)),
        version: current.version + 1,
      };
      monitors.set(id, next);
      return structuredClone(next);
    },

    async appendCheckIn(entry: CheckInEntry) {
      const id = monitorKeyString(entry);
      const entries = checkIns.get(id) ?? [];
      entries.push(structuredClone(entry));
      checkIns.set(id, entries.slice(-checkInRetention));
    },

    async listCheckIns(key: MonitorKey, limit: number) {
      const entries = checkIns.get(monitorKeyString(key)) ?? [];
      return entries.slice(-limit).reverse().map((entry) => structuredClone(entry));
    },

    async close() {
      monitors.clear();
      checkIns.clear();
    },
  };
}
