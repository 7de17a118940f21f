import type { MigrationTarget, MigrationTargetRepository } from "../../ports/MigrationTargetRepository";

export const DEFAULT_MIGRATION_BATCH_SIZE = 5;

export type NextBatchInput = {
  batchSize?: number;
  cursorAfterId?: string | null;
  targetTenantId?: string | null;
  allowedHolderId?: string | null;
};

/**
 * Cursor-paginated reads of definitions still pending migration. Callers pass the last
 * returned id as the next cursor and must make each row ineligible before asking again.
 */
export class MigrationBatcher {
  constructor(private readonly repo: MigrationTargetRepository) {}

  async nextBatch(input: NextBatchInput = {}): Promise<MigrationTarget[]> {
    const batchSize = input.batchSize ?? DEFAULT_MIGRATION_BATCH_SIZE;
    if (!Number.isInteger(batchSize) || batchSize < 1) {
      throw new Error(`batchSize=${String(batchSize)} must be a positive integer`);
    }

    const rows = await this.repo.nextBatch({
      batchSize,
      cursorAfterId: input.cursorAfterId ?? null,
      targetTenantId: input.targetTenantId ?? null,
      allowedHolderId: input.allowedHolderId ?? null
    });
    return rows.slice(0, batchSize);
  }
}

export const cursorAfter = (batch: MigrationTarget[], previous: string | null): string | null =>
  batch.length > 0 ? batch[batch.length - 1].id : previous;
