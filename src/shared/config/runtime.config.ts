import {
  defaultWorkerConfig,
  resolveWorkerConfig,
  workerCaps,
  type WorkerConfig
} from "../../application/process-work-items/worker.config";

export const runtimeCaps = {
  httpTimeoutMs: { min: 1000, max: 300_000 }
} as const;

export type RuntimeConfig = {
  workerConfig: WorkerConfig;
  httpTimeoutMs: number;
};

const parseOptionalIntInRange = (
  env: NodeJS.ProcessEnv,
  name: string,
  range: { min: number; max: number }
): number | undefined => {
  const raw = env[name];
  if (raw == null || raw.trim() === "") return undefined;

  const value = Number(raw);
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${raw} is out of allowed range [${range.min}..${range.max}]`);
  }

  return value;
};

export const loadRuntimeConfigFromEnv = (holderId: string, env: NodeJS.ProcessEnv = process.env): RuntimeConfig => {
  const read = (name: string, field: keyof typeof workerCaps) =>
    parseOptionalIntInRange(env, name, workerCaps[field]) ?? defaultWorkerConfig[field];

  const workerConfig = resolveWorkerConfig({
    holderId,
    pollIntervalMs: read("POLL_INTERVAL_MS", "pollIntervalMs"),
    batchSize: read("POLL_BATCH_SIZE", "batchSize"),
    maxInFlight: read("MAX_IN_FLIGHT", "maxInFlight"),
    leaseTtlMs: read("LEASE_TTL_MS", "leaseTtlMs"),
    leaseRenewIntervalMs: read("LEASE_RENEW_INTERVAL_MS", "leaseRenewIntervalMs"),
    dispatchTimeoutMs: read("DISPATCH_TIMEOUT_MS", "dispatchTimeoutMs"),
    maxAttempts: read("MAX_ATTEMPTS", "maxAttempts"),
    backoffBaseMs: read("RETRY_BACKOFF_BASE_MS", "backoffBaseMs"),
    backoffMaxMs: read("RETRY_BACKOFF_MAX_MS", "backoffMaxMs")
  });

  const httpTimeoutMs = parseOptionalIntInRange(env, "HTTP_TIMEOUT_MS", runtimeCaps.httpTimeoutMs) ?? 30_000;

  return { workerConfig, httpTimeoutMs };
};
