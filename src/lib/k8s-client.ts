import { CoordinationV1Api, KubeConfig } from "@kubernetes/client-node";
import { logger } from "./logger";

let kubeConfig: KubeConfig | undefined;

/**
 * Initialize Kubernetes client from environment
 * Supports both in-cluster and kubeconfig file
 */
export function initializeK8sClient(): KubeConfig {
  if (kubeConfig) return kubeConfig;

  const kc = new KubeConfig();

  try {
    // Try to load from in-cluster config first
    kc.loadFromCluster();
    logger.info("Kubernetes client: using in-cluster configuration");
  } catch {
    // Fall back to kubeconfig file
    try {
      kc.loadFromDefault();
      logger.info("Kubernetes client: using kubeconfig file");
    } catch (error) {
      logger.error({ err: error }, "Failed to initialize Kubernetes client");
      throw new Error(
        "Kubernetes client initialization failed. Ensure running in cluster or KUBECONFIG is set.",
        { cause: error },
      );
    }
  }

  kubeConfig = kc;
  return kc;
}

export function getCoordinationApiClient(): CoordinationV1Api {
  return initializeK8sClient().makeApiClient(CoordinationV1Api);
}
