/**
 * Store wrappers that inject failures and races for testing
 */

import { StoreUnavailableError } from "../../lib/errors";
import type { MonitorStore, Mutation } from "../../store/types";
import type { MonitorKey } from "../../types/monitor";

export interface FlakyStoreOptions {
  /** compareAndSwap calls that fail before the store recovers */
  casFailures?: number;
  /** get calls that fail before the store recovers */
  getFailures?: number;
}

export interface FlakyStore extends MonitorStore {
  calls: { get: number; compareAndSwap: number };
}

/**
 * Fails the first N reads or writes with StoreUnavailableError
 */
export function createFlakyStore(inner: MonitorStore, options: FlakyStoreOptions = {}): FlakyStore {
  let casFailures = options.casFailures ?? 0;
  let getFailures = options.getFailures ?? 0;
  const calls = { get: 0, compareAndSwap: 0 };

  return {
    ...inner,
    calls,

    async get(key: MonitorKey) {
      calls.get++;
      if (getFailures > 0) {
        getFailures--;
        throw new StoreUnavailableError("injected read failure");
      }
      return inner.get(key);
    },

    async compareAndSwap(key: MonitorKey, expectedVersion: number, mutation: Mutation) {
      calls.compareAndSwap++;
      if (casFailures > 0) {
        casFailures--;
        throw new StoreUnavailableError("injected write failure");
      }
      return inner.compareAndSwap(key, expectedVersion, mutation);
    },
  };
}

/**
 * Runs `interleave` once, right before the first compareAndSwap reaches the
 * inner store, so the caller's version is stale and must retry.
 */
export function createRacingStore(
  inner: MonitorStore,
  interleave: () => Promise<void>,
): MonitorStore {
  let raced = false;

  return {
    ...inner,

    async compareAndSwap(key: MonitorKey, expectedVersion: number, mutation: Mutation) {
      if (!raced) {
        raced = true;
        await interleave();
      }
      return inner.compareAndSwap(key, expectedVersion, mutation);
    },
  };
}
