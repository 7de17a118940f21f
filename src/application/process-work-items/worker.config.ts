import type { RetryPolicy } from "../../core/work-items/workItemStateMachine";

export type WorkerConfig = {
  holderId: string;
  pollIntervalMs: number;
  batchSize: number;
  maxInFlight: number;
  leaseTtlMs: number;
  leaseRenewIntervalMs: number;
  dispatchTimeoutMs: number;
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type WorkerConfigInput = Partial<WorkerConfig> & Pick<WorkerConfig, "holderId">;

export const defaultWorkerConfig: Omit<WorkerConfig, "holderId"> = {
  pollIntervalMs: 10_000,
  batchSize: 5,
  maxInFlight: 3,
  leaseTtlMs: 300_000,
  leaseRenewIntervalMs: 60_000,
  dispatchTimeoutMs: 240_000,
  maxAttempts: 3,
  backoffBaseMs: 10_000,
  backoffMaxMs: 3_600_000
};

export const workerCaps = {
  pollIntervalMs: { min: 100, max: 600_000 },
  batchSize: { min: 1, max: 100 },
  maxInFlight: { min: 1, max: 50 },
  leaseTtlMs: { min: 1000, max: 3_600_000 },
  leaseRenewIntervalMs: { min: 500, max: 3_600_000 },
  dispatchTimeoutMs: { min: 1000, max: 3_600_000 },
  maxAttempts: { min: 1, max: 100 },
  backoffBaseMs: { min: 0, max: 86_400_000 },
  backoffMaxMs: { min: 0, max: 86_400_000 }
} as const;

const cappedFields: ReadonlyArray<keyof typeof workerCaps> = [
  "pollIntervalMs",
  "batchSize",
  "maxInFlight",
  "leaseTtlMs",
  "leaseRenewIntervalMs",
  "dispatchTimeoutMs",
  "maxAttempts",
  "backoffBaseMs",
  "backoffMaxMs"
];

const assertIntegerInRange = (name: string, value: number, min: number, max: number) => {
  if (!Number.isInteger(value) || value < min || value > max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${min}..${max}]`);
  }
};

export const validateWorkerConfig = (config: WorkerConfig): WorkerConfig => {
  if (typeof config.holderId !== "string" || config.holderId.trim() === "") {
    throw new Error("holderId must be a non-empty string");
  }
  for (const name of cappedFields) {
    assertIntegerInRange(name, config[name], workerCaps[name].min, workerCaps[name].max);
  }
  if (config.leaseRenewIntervalMs >= config.leaseTtlMs) {
    throw new Error(
      `leaseRenewIntervalMs=${config.leaseRenewIntervalMs} must be lower than leaseTtlMs=${config.leaseTtlMs}`
    );
  }
  if (config.backoffBaseMs > config.backoffMaxMs) {
    throw new Error(`backoffBaseMs=${config.backoffBaseMs} must not exceed backoffMaxMs=${config.backoffMaxMs}`);
  }
  return config;
};

export const resolveWorkerConfig = (input: WorkerConfigInput): WorkerConfig =>
  validateWorkerConfig({
    ...defaultWorkerConfig,
    ...input,
    holderId: input.holderId.trim()
  });

export const toRetryPolicy = (config: WorkerConfig): RetryPolicy => ({
  maxAttempts: config.maxAttempts,
  backoffBaseMs: config.backoffBaseMs,
  backoffMaxMs: config.backoffMaxMs
});
