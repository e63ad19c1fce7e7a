import { ApiException, type V1Lease } from "@kubernetes/client-node";
import { logger } from "../lib/logger";

/**
 * Singleton lock for the sweep detector
 *
 * Only the holder sweeps. Duplicate sweeps would be harmless (every decision
 * goes through compare-and-swap) but wasteful.
 */
export interface LeaderLock {
  readonly name: string;
  /** Take or renew the lock; resolves to whether this instance holds it */
  acquire(): Promise<boolean>;
  isHeld(): boolean;
  release(): Promise<void>;
}

/**
 * Always-held lock for single-replica deployments
 */
export function createLocalLock(): LeaderLock {
  let held = false;
  return {
    name: "local",
    async acquire() {
      held = true;
      return true;
    },
    isHeld: () => held,
    async release() {
      held = false;
    },
  };
}

/**
 * The subset of CoordinationV1Api the lease lock uses
 */
export interface LeaseApi {
  readNamespacedLease(param: { name: string; namespace: string }): Promise<V1Lease>;
  replaceNamespacedLease(param: {
    name: string;
    namespace: string;
    body: V1Lease;
  }): Promise<V1Lease>;
  createNamespacedLease(param: { namespace: string; body: V1Lease }): Promise<V1Lease>;
  deleteNamespacedLease(param: { name: string; namespace: string }): Promise<unknown>;
}

export interface LeaseLockOptions {
  api: LeaseApi;
  namespace: string;
  leaseName: string;
  holderIdentity: string;
  leaseDurationSeconds?: number;
  clock?: () => Date;
}

const DEFAULT_LEASE_DURATION_SECONDS = 30;

function isNotFound(error: unknown): boolean {
  return error instanceof ApiException && error.code === 404;
}

/**
 * Lock backed by a Kubernetes Lease. A lease whose holder has not renewed
 * within its duration is taken over.
 */
export function createLeaseLock(options: LeaseLockOptions): LeaderLock {
  const leaseDurationSeconds = options.leaseDurationSeconds ?? DEFAULT_LEASE_DURATION_SECONDS;
  const clock = options.clock ?? (() => new Date());
  const { api, namespace, leaseName, holderIdentity } = options;
  let held = false;

  function leaseBody(now: Date, previous?: V1Lease): V1Lease {
    const sameHolder = previous?.spec?.holderIdentity === holderIdentity;
    const transitions = previous?.spec?.leaseTransitions ?? 0;
    return {
      apiVersion: "coordination.k8s.io/v1",
      kind: "Lease",
      metadata: {
        name: leaseName,
        namespace,
        ...(previous?.metadata?.resourceVersion !== undefined && {
          resourceVersion: previous.metadata.resourceVersion,
        }),
      },
      spec: {
        holderIdentity,
        leaseDurationSeconds,
        acquireTime: sameHolder && previous?.spec?.acquireTime ? previous.spec.acquireTime : now,
        renewTime: now,
        leaseTransitions: previous && !sameHolder ? transitions + 1 : transitions,
      },
    };
  }

  async function tryAcquire(): Promise<boolean> {
    const now = clock();

    let existing: V1Lease;
    try {
      existing = await api.readNamespacedLease({ name: leaseName, namespace });
    } catch (error) {
      if (!isNotFound(error)) throw error;
      await api.createNamespacedLease({ namespace, body: leaseBody(now) });
      logger.info({ lease: leaseName, holderIdentity }, "Created and acquired sweep lease");
      return true;
    }

    const holder = existing.spec?.holderIdentity;
    const renewTime = existing.spec?.renewTime;
    const duration = existing.spec?.leaseDurationSeconds ?? leaseDurationSeconds;
    const expiresAt = renewTime ? new Date(renewTime).getTime() + duration * 1000 : 0;

    if (holder && holder !== holderIdentity && expiresAt > now.getTime()) {
      if (held) {
        logger.warn({ lease: leaseName, holder }, "Sweep lease taken over by another instance");
      }
      return false;
    }

    await api.replaceNamespacedLease({
      name: leaseName,
      namespace,
      body: leaseBody(now, existing),
    });
    if (!held) {
      logger.info({ lease: leaseName, holderIdentity }, "Acquired sweep lease");
    }
    return true;
  }

  return {
    name: "kubernetes-lease",

    async acquire() {
      try {
        held = await tryAcquire();
      } catch (error) {
        // Replace races surface as 409 conflicts; either way we do not hold it
        logger.warn({ lease: leaseName, err: error }, "Failed to acquire sweep lease");
        held = false;
      }
      return held;
    },

    isHeld: () => held,

    async release() {
      if (!held) return;
      held = false;
      try {
        await api.deleteNamespacedLease({ name: leaseName, namespace });
        logger.info({ lease: leaseName }, "Released sweep lease");
      } catch (error) {
        logger.warn({ lease: leaseName, err: error }, "Failed to release sweep lease");
      }
    },
  };
}
