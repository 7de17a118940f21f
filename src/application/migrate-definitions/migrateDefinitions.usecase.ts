import type { AcquireResult } from "../../core/leases/Lease";
import type { DefinitionMigration, DefinitionMigrationResult } from "../../core/definitions/definitionMigration";
import type { MigrationTarget, MigrationTargetRepository } from "../../ports/MigrationTargetRepository";
import { logInfo, logWarn, toErrorMessage } from "../../shared/logging/log";
import type { LeaseManager } from "../lease-manager/leaseManager";
import { resolveMigrationConfig, type MigrationConfig } from "./migration.config";
import {
  createMigrationSummaryTracker,
  toMigrationFatalError,
  type MigrationErrorContext,
  type MigrationSummary
} from "./migration.error-handler";
import { cursorAfter, MigrationBatcher } from "./migrationBatcher";

export type MigrateDefinitionsDeps = {
  repo: MigrationTargetRepository;
  leases: LeaseManager;
  migration: DefinitionMigration;
  config?: Partial<MigrationConfig>;
};

type Tracker = ReturnType<typeof createMigrationSummaryTracker>;

/**
 * Walks every pending definition in id order, backing up each batch before rewriting it.
 * Per-row migration errors are counted and skipped; store errors stop the run.
 */
export const migrateDefinitions = async (deps: MigrateDefinitionsDeps): Promise<MigrationSummary> => {
  const { repo, leases, migration } = deps;
  const config = resolveMigrationConfig(deps.config);
  const batcher = new MigrationBatcher(repo);
  const tracker = createMigrationSummaryTracker();
  let cursor: string | null = null;

  logInfo({
    event: "migration.started",
    migration: migration.name,
    dryRun: config.dryRun,
    batchSize: config.batchSize,
    maxBatches: config.maxBatches,
    tenantId: config.tenantId,
    holderId: config.holderId,
    leaseRows: config.leaseRows
  });

  while (true) {
    if (config.maxBatches !== null && tracker.summary().batches >= config.maxBatches) {
      logInfo({ event: "migration.max_batches_reached", maxBatches: config.maxBatches });
      break;
    }

    const context: MigrationErrorContext = { batch: tracker.summary().batches + 1, cursorAfterId: cursor };
    let batch: MigrationTarget[];
    try {
      batch = await batcher.nextBatch({
        batchSize: config.batchSize,
        cursorAfterId: cursor,
        targetTenantId: config.tenantId,
        allowedHolderId: config.holderId
      });
    } catch (err) {
      throw toMigrationFatalError(err, "batch_read_failed", context);
    }

    if (batch.length === 0) break;

    if (!config.dryRun) {
      try {
        await repo.backup(batch);
      } catch (err) {
        throw toMigrationFatalError(err, "backup_failed", context);
      }
    }

    for (const target of batch) {
      await migrateRow(target, { deps, config, tracker, context });
    }

    cursor = cursorAfter(batch, cursor);
    if (cursor !== null) tracker.addBatch(cursor);
    logInfo({ event: "migration.batch", batch: context.batch, size: batch.length, cursor });
  }

  const summary = tracker.summary();
  logInfo({ event: "migration.completed", migration: migration.name, dryRun: config.dryRun, ...summary });
  return summary;
};

const migrateRow = async (
  target: MigrationTarget,
  run: { deps: MigrateDefinitionsDeps; config: MigrationConfig; tracker: Tracker; context: MigrationErrorContext }
): Promise<void> => {
  const { deps, config, tracker } = run;
  const rowContext = { ...run.context, definitionId: target.id, tenantId: target.tenantId };
  const holderId = config.leaseRows && !config.dryRun ? config.holderId : null;

  if (holderId !== null) {
    let acquired: AcquireResult;
    try {
      acquired = await deps.leases.acquire(target.id, target.tenantId, holderId, null);
    } catch (err) {
      throw toMigrationFatalError(err, "lease_failed", rowContext);
    }
    if (acquired.kind === "conflict") {
      tracker.addSkippedLocked();
      logInfo({ event: "migration.row_locked", definitionId: target.id, tenantId: target.tenantId });
      return;
    }
  }

  try {
    let result: DefinitionMigrationResult;
    try {
      result = deps.migration.migrate(target);
    } catch (err) {
      tracker.addFailed();
      logWarn({
        event: "migration.row_failed",
        definitionId: target.id,
        tenantId: target.tenantId,
        reason: toErrorMessage(err)
      });
      return;
    }

    if (result.kind === "unchanged") {
      tracker.addUnchanged();
      return;
    }

    if (!config.dryRun) {
      try {
        await deps.repo.saveMigrated(target, { definition: result.definition, payload: result.payload });
      } catch (err) {
        throw toMigrationFatalError(err, "save_failed", rowContext);
      }
    }
    tracker.addMigrated(result.activitiesUpdated);
    logInfo({
      event: "migration.row_migrated",
      definitionId: target.id,
      tenantId: target.tenantId,
      activitiesUpdated: result.activitiesUpdated,
      dryRun: config.dryRun
    });
  } finally {
    if (holderId !== null) {
      await releaseRowLease(deps.leases, target, holderId);
    }
  }
};

const releaseRowLease = async (leases: LeaseManager, target: MigrationTarget, holderId: string) => {
  try {
    await leases.release(target.id, target.tenantId, holderId);
  } catch (err) {
    logWarn({
      event: "lease.release_failed",
      definitionId: target.id,
      tenantId: target.tenantId,
      reason: toErrorMessage(err)
    });
  }
};
