export type MigrationConfig = {
  dryRun: boolean;
  batchSize: number;
  maxBatches: number | null;
  tenantId: string | null;
  // Allowed lease holder for nextBatch, and owner of the per-row leases when leaseRows is set.
  holderId: string | null;
  leaseRows: boolean;
};

export const defaultMigrationConfig: MigrationConfig = {
  dryRun: false,
  batchSize: 5,
  maxBatches: null,
  tenantId: null,
  holderId: null,
  leaseRows: false
};

export const migrationCaps = {
  batchSize: { min: 1, max: 1000 },
  maxBatches: { min: 1, max: 1_000_000 }
} as const;

const assertIntegerInRange = (name: string, value: number, range: { min: number; max: number }) => {
  if (!Number.isInteger(value) || value < range.min || value > range.max) {
    throw new Error(`${name}=${String(value)} is out of allowed range [${range.min}..${range.max}]`);
  }
};

const blankToNull = (value: string | null) => (value == null || value.trim() === "" ? null : value.trim());

export const validateMigrationConfig = (config: MigrationConfig): MigrationConfig => {
  assertIntegerInRange("batchSize", config.batchSize, migrationCaps.batchSize);
  if (config.maxBatches !== null) {
    assertIntegerInRange("maxBatches", config.maxBatches, migrationCaps.maxBatches);
  }

  const normalized: MigrationConfig = {
    ...config,
    tenantId: blankToNull(config.tenantId),
    holderId: blankToNull(config.holderId)
  };
  if (normalized.leaseRows && normalized.holderId === null) {
    throw new Error("leaseRows requires a holderId");
  }
  return normalized;
};

export const resolveMigrationConfig = (input: Partial<MigrationConfig> = {}): MigrationConfig =>
  validateMigrationConfig({ ...defaultMigrationConfig, ...input });
