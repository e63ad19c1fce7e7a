import { logger } from "./logger";

export type StoreType = "memory" | "sqlite" | "etcd";
export type LeaderElectionMode = "none" | "kubernetes";

const STORE_TYPES: readonly StoreType[] = ["memory", "sqlite", "etcd"];
const LEADER_MODES: readonly LeaderElectionMode[] = ["none", "kubernetes"];

function intFrom(value: string | undefined, fallback: number): number {
  if (value === undefined || value === "") return fallback;
  return parseInt(value, 10);
}

function oneOf<T extends string>(
  value: string | undefined,
  allowed: readonly T[],
  fallback: T,
): T {
  if (!value) return fallback;
  const match = allowed.find((candidate) => candidate === value);
  return match ?? fallback;
}

/**
 * Build the service configuration from environment variables
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env) {
  return {
    // Server
    port: intFrom(env.PORT, 3000),
    host: env.HOST || "0.0.0.0",
    metricsPort: intFrom(env.METRICS_PORT, 9090),
    env: env.NODE_ENV || "development",

    // Store
    storeType: oneOf(env.STORE_TYPE, STORE_TYPES, "sqlite"),
    rawStoreType: env.STORE_TYPE,
    databaseUrl: env.DATABASE_URL || "sqlite:./cronsentinel.db",
    etcdEndpoints: env.ETCD_ENDPOINTS || "http://127.0.0.1:2379",
    etcdPrefix: env.ETCD_PREFIX || "/cronsentinel",
    runRetention: intFrom(env.RUN_RETENTION, 100),
    checkInRetention: intFrom(env.CHECKIN_RETENTION, 1000),

    // Ingestion
    rateLimitMax: intFrom(env.RATE_LIMIT_MAX, 6),
    rateLimitWindowSeconds: intFrom(env.RATE_LIMIT_WINDOW_SECONDS, 60),
    casMaxAttempts: intFrom(env.CAS_MAX_ATTEMPTS, 3),
    casBaseDelayMs: intFrom(env.CAS_BASE_DELAY_MS, 25),
    ingestDeadlineMs: intFrom(env.INGEST_DEADLINE_MS, 5000),

    // Sweep detector
    sweepIntervalSeconds: intFrom(env.SWEEP_INTERVAL_SECONDS, 30),
    sweepMonitorTimeoutMs: intFrom(env.SWEEP_MONITOR_TIMEOUT_MS, 5000),
    sweepMaxCatchup: intFrom(env.SWEEP_MAX_CATCHUP, 60),
    leaderElection: oneOf(env.LEADER_ELECTION, LEADER_MODES, "none"),
    rawLeaderElection: env.LEADER_ELECTION,
    kubeNamespace: env.KUBE_NAMESPACE || "monitoring",
    leaseName: env.LEASE_NAME || "cronsentinel-sweep",
    holderIdentity: env.HOSTNAME || "cronsentinel",

    // Alerting
    alertmanagerUrl: env.ALERTMANAGER_URL || undefined,
  };
}

export type Config = ReturnType<typeof loadConfig>;

export const config: Config = loadConfig();

/**
 * Collect configuration problems without throwing
 */
export function configErrors(cfg: Config): string[] {
  const errors: string[] = [];

  const positive: Array<[string, number]> = [
    ["PORT", cfg.port],
    ["METRICS_PORT", cfg.metricsPort],
    ["RATE_LIMIT_MAX", cfg.rateLimitMax],
    ["RATE_LIMIT_WINDOW_SECONDS", cfg.rateLimitWindowSeconds],
    ["CAS_MAX_ATTEMPTS", cfg.casMaxAttempts],
    ["INGEST_DEADLINE_MS", cfg.ingestDeadlineMs],
    ["SWEEP_INTERVAL_SECONDS", cfg.sweepIntervalSeconds],
    ["SWEEP_MONITOR_TIMEOUT_MS", cfg.sweepMonitorTimeoutMs],
    ["SWEEP_MAX_CATCHUP", cfg.sweepMaxCatchup],
    ["RUN_RETENTION", cfg.runRetention],
    ["CHECKIN_RETENTION", cfg.checkInRetention],
  ];
  for (const [name, value] of positive) {
    if (!Number.isInteger(value) || value < 1) {
      errors.push(`${name} must be a positive integer`);
    }
  }

  if (!Number.isInteger(cfg.casBaseDelayMs) || cfg.casBaseDelayMs < 0) {
    errors.push("CAS_BASE_DELAY_MS must be a non-negative integer");
  }

  if (cfg.rawStoreType && cfg.rawStoreType !== cfg.storeType) {
    errors.push(`STORE_TYPE must be one of: ${STORE_TYPES.join(", ")}`);
  }

  if (cfg.rawLeaderElection && cfg.rawLeaderElection !== cfg.leaderElection) {
    errors.push(`LEADER_ELECTION must be one of: ${LEADER_MODES.join(", ")}`);
  }

  if (cfg.storeType === "sqlite" && !cfg.databaseUrl.startsWith("sqlite:")) {
    errors.push("DATABASE_URL must start with sqlite: when STORE_TYPE=sqlite");
  }

  return errors;
}

// Validate required config
export function validateConfig(cfg: Config = config): void {
  const errors = configErrors(cfg);

  if (errors.length > 0) {
    logger.error("Configuration errors:");
    for (const e of errors) {
      logger.error(`  - ${e}`);
    }
    throw new Error("Invalid configuration");
  }

  logger.info(
    {
      env: cfg.env,
      port: cfg.port,
      storeType: cfg.storeType,
      leaderElection: cfg.leaderElection,
    },
    "Configuration loaded",
  );
}

export default config;
