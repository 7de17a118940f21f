export type MigrationTarget = {
  id: string;
  tenantId: string;
  name: string;
  definition: unknown;
  payload: string;
};

export type MigratedDefinition = {
  definition: unknown;
  payload: string;
};

export type NextBatchParams = {
  batchSize: number;
  cursorAfterId: string | null;
  targetTenantId: string | null;
  allowedHolderId: string | null;
};

export interface MigrationTargetRepository {
  /**
   * Rows still carrying the pre-migration marker, strictly after `cursorAfterId` in id
   * order, excluding rows leased by anyone other than `allowedHolderId`.
   */
  nextBatch(params: NextBatchParams): Promise<MigrationTarget[]>;
  backup(targets: MigrationTarget[]): Promise<void>;
  saveMigrated(target: MigrationTarget, migrated: MigratedDefinition): Promise<void>;
}
