import { defaultWorkerConfig } from "../../src/application/process-work-items/worker.config";
import { loadRuntimeConfigFromEnv } from "../../src/shared/config/runtime.config";

describe("runtime config caps", () => {
  it("falls back to defaults when nothing is set", () => {
    expect(loadRuntimeConfigFromEnv("replica-a", {})).toEqual({
      workerConfig: { holderId: "replica-a", ...defaultWorkerConfig },
      httpTimeoutMs: 30000
    });
  });

  it("accepts boundary values within allowed caps", () => {
    const runtime = loadRuntimeConfigFromEnv("replica-a", {
      POLL_INTERVAL_MS: "100",
      POLL_BATCH_SIZE: "100",
      MAX_IN_FLIGHT: "50",
      LEASE_TTL_MS: "3600000",
      LEASE_RENEW_INTERVAL_MS: "500",
      DISPATCH_TIMEOUT_MS: "1000",
      MAX_ATTEMPTS: "1",
      RETRY_BACKOFF_BASE_MS: "0",
      RETRY_BACKOFF_MAX_MS: "86400000",
      HTTP_TIMEOUT_MS: "300000"
    });

    expect(runtime).toEqual({
      httpTimeoutMs: 300000,
      workerConfig: {
        holderId: "replica-a",
        pollIntervalMs: 100,
        batchSize: 100,
        maxInFlight: 50,
        leaseTtlMs: 3600000,
        leaseRenewIntervalMs: 500,
        dispatchTimeoutMs: 1000,
        maxAttempts: 1,
        backoffBaseMs: 0,
        backoffMaxMs: 86400000
      }
    });
  });

  it.each([
    { env: { POLL_INTERVAL_MS: "99" }, message: "POLL_INTERVAL_MS=99 is out of allowed range [100..600000]" },
    { env: { POLL_BATCH_SIZE: "0" }, message: "POLL_BATCH_SIZE=0 is out of allowed range [1..100]" },
    { env: { MAX_IN_FLIGHT: "51" }, message: "MAX_IN_FLIGHT=51 is out of allowed range [1..50]" },
    { env: { LEASE_TTL_MS: "2.5" }, message: "LEASE_TTL_MS=2.5 is out of allowed range [1000..3600000]" },
    { env: { MAX_ATTEMPTS: "many" }, message: "MAX_ATTEMPTS=many is out of allowed range [1..100]" },
    { env: { HTTP_TIMEOUT_MS: "999" }, message: "HTTP_TIMEOUT_MS=999 is out of allowed range [1000..300000]" }
  ])("rejects out-of-range config: $message", ({ env, message }) => {
    expect(() => loadRuntimeConfigFromEnv("replica-a", env)).toThrow(message);
  });

  it("rejects a renew interval that is not below the lease TTL", () => {
    expect(() => loadRuntimeConfigFromEnv("replica-a", { LEASE_TTL_MS: "60000", LEASE_RENEW_INTERVAL_MS: "60000" })).toThrow(
      "leaseRenewIntervalMs=60000 must be lower than leaseTtlMs=60000"
    );
  });

  it("treats blank values as unset", () => {
    expect(loadRuntimeConfigFromEnv("replica-a", { POLL_BATCH_SIZE: "  " }).workerConfig.batchSize).toBe(5);
  });
});
