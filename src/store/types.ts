/**
 * Monitor Store contract
 *
 * Every implementation stores one record per (slug, environment) with a
 * version counter. All state transitions go through compareAndSwap; nothing
 * overwrites a record blindly.
 */

import type { CheckInEntry, MonitorKey, MonitorRecord } from "../types/monitor";

/**
 * Produces the next record from the current one. Implementations bump
 * `version` themselves; the mutation never touches it.
 */
export type Mutation = (current: MonitorRecord) => MonitorRecord;

export interface MonitorStore {
  /** Current record, or null when the monitor was never created */
  get(key: MonitorKey): Promise<MonitorRecord | null>;

  list(): Promise<MonitorRecord[]>;

  /**
   * Insert when absent. When a record already exists it is returned unchanged
   * (first creator wins).
   */
  create(record: MonitorRecord): Promise<MonitorRecord>;

  /**
   * Apply `mutation` only if the stored version equals `expectedVersion`
   * @throws ConflictError when the version moved
   * @throws StoreUnavailableError on I/O failure
   */
  compareAndSwap(
    key: MonitorKey,
    expectedVersion: number,
    mutation: Mutation,
  ): Promise<MonitorRecord>;

  appendCheckIn(entry: CheckInEntry): Promise<void>;

  /** Most recent entries first */
  listCheckIns(key: MonitorKey, limit: number): Promise<CheckInEntry[]>;

  close(): Promise<void>;
}
