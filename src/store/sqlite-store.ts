import { and, desc, eq } from "drizzle-orm";
import { type DatabaseHandle, openDatabase } from "../db";
import {
  type CheckInRow,
  checkIns,
  type MonitorRow,
  monitors,
  type NewCheckInRow,
  type NewMonitorRow,
} from "../db/schema";
import { ConflictError, CheckInServiceError, StoreUnavailableError } from "../lib/errors";
import { logger } from "../lib/logger";
import {
  type CheckInEntry,
  CheckInEntrySchema,
  type MonitorKey,
  type MonitorRecord,
  MonitorRecordSchema,
  monitorKeyString,
} from "../types/monitor";
import type { MonitorStore, Mutation } from "./types";

function toRecord(row: MonitorRow): MonitorRecord {
  return { ...MonitorRecordSchema.parse(JSON.parse(row.data)), version: row.version };
}

function toMonitorRow(record: MonitorRecord): NewMonitorRow {
  return {
    id: monitorKeyString(record),
    slug: record.slug,
    environment: record.environment,
    version: record.version,
    data: JSON.stringify(record),
    updatedAt: record.updatedAt,
  };
}

function toCheckInRow(entry: CheckInEntry): NewCheckInRow {
  return {
    id: entry.id,
    monitorId: monitorKeyString(entry),
    slug: entry.slug,
    environment: entry.environment,
    checkInId: entry.checkInId ?? null,
    status: entry.status,
    outcome: entry.outcome,
    runId: entry.runId ?? null,
    timestamp: entry.timestamp,
    durationSeconds: entry.durationSeconds ?? null,
    receivedAt: entry.receivedAt,
  };
}

function toCheckInEntry(row: CheckInRow): CheckInEntry {
  return CheckInEntrySchema.parse({
    id: row.id,
    checkInId: row.checkInId ?? undefined,
    slug: row.slug,
    environment: row.environment,
    status: row.status,
    timestamp: row.timestamp,
    durationSeconds: row.durationSeconds ?? undefined,
    runId: row.runId ?? undefined,
    outcome: row.outcome,
    receivedAt: row.receivedAt,
  });
}

/**
 * Run a store operation, reporting driver failures as StoreUnavailableError
 */
function guarded<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof CheckInServiceError) throw error;
    logger.error({ err: error, operation }, "SQLite operation failed");
    throw new StoreUnavailableError(`SQLite ${operation} failed`, { cause: error });
  }
}

/**
 * SQLite-backed store. Compare-and-swap is a conditional
 * `UPDATE ... WHERE version = ?`; zero changed rows means another writer won.
 */
export function createSqliteStore(databaseUrl: string): MonitorStore {
  const handle: DatabaseHandle = openDatabase(databaseUrl);
  const { db } = handle;

  function read(id: string): MonitorRecord | null {
    const row = db.select().from(monitors).where(eq(monitors.id, id)).get();
    return row ? toRecord(row) : null;
  }

  return {
    async get(key: MonitorKey) {
      return guarded("get", () => read(monitorKeyString(key)));
    },

    async list() {
      return guarded("list", () =>
        db
          .select()
          .from(monitors)
          .orderBy(monitors.id)
          .all()
          .map(toRecord),
      );
    },

    async create(record: MonitorRecord) {
      return guarded("create", () => {
        const row = toMonitorRow(record);
        const result = db.insert(monitors).values(row).onConflictDoNothing().run();

        if (result.changes === 0) {
          const existing = read(row.id);
          if (existing) return existing;
        }
        return record;
      });
    },

    async compareAndSwap(key: MonitorKey, expectedVersion: number, mutation: Mutation) {
      return guarded("compareAndSwap", () => {
        const id = monitorKeyString(key);
        const current = read(id);
        if (!current || current.version !== expectedVersion) {
          throw new ConflictError(id, expectedVersion, current?.version ?? null);
        }

        const next: MonitorRecord = { ...mutation(current), version: expectedVersion + 1 };
        const result = db
          .update(monitors)
          .set({
            version: next.version,
            data: JSON.stringify(next),
            updatedAt: next.updatedAt,
          })
          .where(and(eq(monitors.id, id), eq(monitors.version, expectedVersion)))
          .run();

        if (result.changes === 0) {
          throw new ConflictError(id, expectedVersion, read(id)?.version ?? null);
        }
        return next;
      });
    },

    async appendCheckIn(entry: CheckInEntry) {
      guarded("appendCheckIn", () => {
        db.insert(checkIns).values(toCheckInRow(entry)).run();
      });
    },

    async listCheckIns(key: MonitorKey, limit: number) {
      return guarded("listCheckIns", () =>
        db
          .select()
          .from(checkIns)
          .where(eq(checkIns.monitorId, monitorKeyString(key)))
          .orderBy(desc(checkIns.seq))
          .limit(limit)
          .all()
          .map(toCheckInEntry),
      );
    },

    async close() {
      handle.close();
    },
  };
}
