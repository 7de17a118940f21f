#!/usr/bin/env node
import { Command, CommanderError, InvalidArgumentError } from "commander";
import type { MigrationConfig } from "../application/migrate-definitions/migration.config";
import { runMigration } from "../composition/root";
import { reportCliFailure } from "./errorEnvelope";

type MigrateCliOptions = {
  dryRun: boolean;
  batchSize: number;
  maxBatches?: number;
  tenantId?: string;
  holderId?: string;
  leaseRows: boolean;
};

const parsePositiveInt = (raw: string): number => {
  if (!/^\d+$/.test(raw.trim()) || Number(raw) < 1) {
    throw new InvalidArgumentError("must be a positive integer");
  }
  return Number(raw);
};

export const buildMigrateCommand = (): Command =>
  new Command()
    .name("workitem-migrate")
    .description("Migrate stored process definitions in resumable id-ordered batches")
    .option("--dry-run", "compute and log migrations without writing", false)
    .option("--batch-size <n>", "rows per batch", parsePositiveInt, 5)
    .option("--max-batches <n>", "stop after this many batches", parsePositiveInt)
    .option("--tenant-id <id>", "only migrate definitions of this tenant")
    .option("--holder-id <id>", "lease holder allowed to revisit its own leased rows")
    .option("--lease-rows", "take a durable lease on each row before migrating it (requires --holder-id)", false);

export const parseMigrateArgs = (argv: string[]): Partial<MigrationConfig> => {
  const command = buildMigrateCommand().exitOverride();
  command.parse(argv, { from: "user" });
  const opts = command.opts<MigrateCliOptions>();

  return {
    dryRun: opts.dryRun,
    batchSize: opts.batchSize,
    maxBatches: opts.maxBatches ?? null,
    tenantId: opts.tenantId ?? null,
    holderId: opts.holderId ?? null,
    leaseRows: opts.leaseRows
  };
};

export const executeMigrateCli = async (argv: string[] = process.argv.slice(2)): Promise<void> => {
  try {
    await runMigration(parseMigrateArgs(argv));
  } catch (err) {
    // Commander already printed usage or the argument error.
    if (err instanceof CommanderError) {
      process.exit(err.exitCode);
    }
    reportCliFailure("migration.failed", err);
    process.exit(1);
  }
};

if (require.main === module) {
  void executeMigrateCli();
}
