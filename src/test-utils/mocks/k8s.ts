/**
 * Mock Kubernetes Lease API for testing
 */

import { ApiException, type V1Lease } from "@kubernetes/client-node";
import type { LeaseApi } from "../../sweep/lock";

export interface MockLeaseApi extends LeaseApi {
  leases: Map<string, V1Lease>;
}

function notFound(name: string): ApiException<string> {
  return new ApiException(404, `leases "${name}" not found`, "", {});
}

/**
 * In-memory lease API keyed by namespace/name
 */
export function createMockLeaseApi(): MockLeaseApi {
  const leases = new Map<string, V1Lease>();
  let resourceVersion = 0;

  function stamp(body: V1Lease): V1Lease {
    resourceVersion++;
    return {
      ...body,
      metadata: { ...body.metadata, resourceVersion: String(resourceVersion) },
    };
  }

  return {
    leases,

    async readNamespacedLease({ name, namespace }) {
      const lease = leases.get(`${namespace}/${name}`);
      if (!lease) throw notFound(name);
      return lease;
    },

    async createNamespacedLease({ namespace, body }) {
      const name = body.metadata?.name ?? "";
      const lease = stamp(body);
      leases.set(`${namespace}/${name}`, lease);
      return lease;
    },

    async replaceNamespacedLease({ name, namespace, body }) {
      if (!leases.has(`${namespace}/${name}`)) throw notFound(name);
      const lease = stamp(body);
      leases.set(`${namespace}/${name}`, lease);
      return lease;
    },

    async deleteNamespacedLease({ name, namespace }) {
      if (!leases.delete(`${namespace}/${name}`)) throw notFound(name);
      return {};
    },
  };
}
