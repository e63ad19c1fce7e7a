/**
 * etcd-backed Monitor Store
 *
 * Records live at `{prefix}/monitors/{environment}/{slug}` as JSON.
 * Compare-and-swap is an etcd transaction guarded on the key's mod revision;
 * creation is guarded on the key not existing yet.
 */

import { Etcd3 } from "etcd3";
import { v4 as uuidv4 } from "uuid";
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

interface StoredRecord {
  record: MonitorRecord;
  modRevision: string;
}

async function guarded<T>(operation: string, fn: () => Promise<T>): Promise<T> {
  try {
    return await fn();
  } catch (error) {
    if (error instanceof CheckInServiceError) throw error;
    logger.error({ err: error, operation }, "etcd operation failed");
    throw new StoreUnavailableError(`etcd ${operation} failed`, { cause: error });
  }
}

export interface EtcdStoreOptions {
  endpoints: string;
  prefix: string;
}

export async function createEtcdStore(options: EtcdStoreOptions): Promise<MonitorStore> {
  const client = new Etcd3({
    hosts: options.endpoints.split(","),
    grpcOptions: {
      "grpc.max_send_message_length": 10 * 1024 * 1024, // 10MB
      "grpc.max_receive_message_length": 10 * 1024 * 1024, // 10MB
      "grpc.keepalive_time_ms": 10000, // 10 seconds
      "grpc.keepalive_timeout_ms": 5000, // 5 seconds
    },
  });

  try {
    await client.maintenance.status();
    logger.info({ endpoints: options.endpoints }, "etcd connection established");
  } catch (error) {
    logger.error({ err: error }, "Failed to connect to etcd");
    client.close();
    throw new StoreUnavailableError("etcd is unreachable", { cause: error });
  }

  const monitorPrefix = `${options.prefix}/monitors/`;
  const monitorKey = (key: MonitorKey) => `${monitorPrefix}${monitorKeyString(key)}`;
  const checkInPrefix = (key: MonitorKey) =>
    `${options.prefix}/checkins/${monitorKeyString(key)}/`;

  async function read(key: MonitorKey): Promise<StoredRecord | null> {
    const response = await client.get(monitorKey(key)).exec();
    const kv = response.kvs[0];
    if (!kv) return null;
    return {
      record: MonitorRecordSchema.parse(JSON.parse(kv.value.toString())),
      modRevision: kv.mod_revision,
    };
  }

  return {
    async get(key: MonitorKey) {
      return guarded("get", async () => (await read(key))?.record ?? null);
    },

    async list() {
      return guarded("list", async () => {
        const values = await client.getAll().prefix(monitorPrefix).sort("Key", "Ascend").strings();
        return Object.values(values).map((raw) => MonitorRecordSchema.parse(JSON.parse(raw)));
      });
    },

    async create(record: MonitorRecord) {
      return guarded("create", async () => {
        const key = monitorKey(record);
        const result = await client
          .if(key, "Create", "==", 0)
          .then(client.put(key).value(JSON.stringify(record)))
          .commit();

        if (result.succeeded) return record;

        const existing = await read(record);
        return existing ? existing.record : record;
      });
    },

    async compareAndSwap(key: MonitorKey, expectedVersion: number, mutation: Mutation) {
      return guarded("compareAndSwap", async () => {
        const id = monitorKeyString(key);
        const current = await read(key);
        if (!current || current.record.version !== expectedVersion) {
          throw new ConflictError(id, expectedVersion, current?.record.version ?? null);
        }

        const next: MonitorRecord = {
          ...mutation(current.record),
          version: expectedVersion + 1,
        };

        const result = await client
          .if(monitorKey(key), "Mod", "==", current.modRevision)
          .then(client.put(monitorKey(key)).value(JSON.stringify(next)))
          .commit();

        if (!result.succeeded) {
          const latest = await read(key);
          throw new ConflictError(id, expectedVersion, latest?.record.version ?? null);
        }
        return next;
      });
    },

    async appendCheckIn(entry: CheckInEntry) {
      await guarded("appendCheckIn", async () => {
        // receivedAt first so keys sort chronologically
        const key = `${checkInPrefix(entry)}${entry.receivedAt}-${uuidv4()}`;
        await client.put(key).value(JSON.stringify(entry)).exec();
      });
    },

    async listCheckIns(key: MonitorKey, limit: number) {
      return guarded("listCheckIns", async () => {
        const values = await client
          .getAll()
          .prefix(checkInPrefix(key))
          .sort("Key", "Descend")
          .limit(limit)
          .strings();
        return Object.values(values).map((raw) => CheckInEntrySchema.parse(JSON.parse(raw)));
      });
    },

    async close() {
      client.close();
      logger.info("etcd connection closed");
    },
  };
}
