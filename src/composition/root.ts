import type { Pool } from "pg";
import { LeaseManager } from "../application/lease-manager/leaseManager";
import { migrateDefinitions } from "../application/migrate-definitions/migrateDefinitions.usecase";
import type { MigrationConfig } from "../application/migrate-definitions/migration.config";
import type { MigrationSummary } from "../application/migrate-definitions/migration.error-handler";
import { Dispatcher } from "../application/process-work-items/dispatcher";
import { Poller } from "../application/process-work-items/poller";
import { StateTransitioner } from "../application/process-work-items/stateTransitioner";
import { toRetryPolicy, type WorkerConfig } from "../application/process-work-items/worker.config";
import { flattenActivityProperties } from "../core/definitions/flattenActivityProperties";
import { HttpDownstreamFanOut } from "../infrastructure/http/HttpDownstreamFanOut";
import { HttpJsonClient } from "../infrastructure/http/httpJsonClient";
import { HttpWorkItemProcessor } from "../infrastructure/http/HttpWorkItemProcessor";
import { PgLeaseStore } from "../infrastructure/postgres/PgLeaseStore";
import { PgMigrationTargetRepository } from "../infrastructure/postgres/PgMigrationTargetRepository";
import { createPgPool, ensureSchema } from "../infrastructure/postgres/PgPoolFactory";
import { PgWorkItemRepository } from "../infrastructure/postgres/PgWorkItemRepository";
import type { DownstreamFanOut } from "../ports/DownstreamFanOut";
import type { WorkItemProcessor } from "../ports/WorkItemProcessor";
import { loadEnv } from "../shared/config/env";
import { loadRuntimeConfigFromEnv } from "../shared/config/runtime.config";
import { logInfo } from "../shared/logging/log";
import { close, createServer, listen } from "../server";

export type WorkerHandle = {
  poller: Poller;
  stop: () => Promise<void>;
};

export const buildPoller = (deps: {
  pool: Pool;
  processor: WorkItemProcessor;
  fanOut: DownstreamFanOut;
  config: WorkerConfig;
}): Poller => {
  const { pool, processor, fanOut, config } = deps;
  const repo = new PgWorkItemRepository(pool);
  const leases = new LeaseManager(new PgLeaseStore(pool));
  const transitioner = new StateTransitioner({
    repo,
    leases,
    fanOut,
    holderId: config.holderId,
    retryPolicy: toRetryPolicy(config)
  });
  const dispatcher = new Dispatcher({ repo, leases, processor, transitioner, config });
  return new Poller({ repo, leases, dispatcher, transitioner, config });
};

export const runWorker = async (): Promise<WorkerHandle> => {
  const env = loadEnv();
  const { workerConfig, httpTimeoutMs } = loadRuntimeConfigFromEnv(env.WORKER_ID);

  const pool = createPgPool(env.DATABASE_URL, workerConfig.maxInFlight + 2);
  try {
    await ensureSchema(pool);
  } catch (err) {
    await pool.end();
    throw err;
  }

  const poller = buildPoller({
    pool,
    processor: new HttpWorkItemProcessor(new HttpJsonClient(env.PROCESSOR_BASE_URL, httpTimeoutMs)),
    fanOut: new HttpDownstreamFanOut(new HttpJsonClient(env.PROCESS_ENGINE_BASE_URL, httpTimeoutMs)),
    config: workerConfig
  });
  const server = createServer(() => poller.status());

  try {
    await listen(server, env.HEALTH_PORT);
  } catch (err) {
    await pool.end();
    throw err;
  }
  poller.start();
  logInfo({ event: "worker.started", holderId: workerConfig.holderId, healthPort: env.HEALTH_PORT });

  return {
    poller,
    stop: async () => {
      await poller.stop();
      await close(server);
      await pool.end();
      logInfo({ event: "worker.stopped", holderId: workerConfig.holderId });
    }
  };
};

export const runMigration = async (config: Partial<MigrationConfig>): Promise<MigrationSummary> => {
  const env = loadEnv();
  const pool = createPgPool(env.DATABASE_URL, 2);

  try {
    await ensureSchema(pool);
    return await migrateDefinitions({
      repo: new PgMigrationTargetRepository(pool, { pendingMarker: flattenActivityProperties.pendingMarker }),
      leases: new LeaseManager(new PgLeaseStore(pool)),
      migration: flattenActivityProperties,
      config
    });
  } finally {
    await pool.end();
  }
};
