import type { Pool } from "pg";
import type {
  MigratedDefinition,
  MigrationTarget,
  MigrationTargetRepository,
  NextBatchParams
} from "../../ports/MigrationTargetRepository";
import { withTransaction } from "./PgPoolFactory";

type DefinitionRow = {
  id: string;
  tenant_id: string;
  name: string;
  definition: unknown;
  payload: string | null;
};

const mapDefinitionRow = (row: DefinitionRow): MigrationTarget => ({
  id: row.id,
  tenantId: row.tenant_id,
  name: row.name,
  definition: row.definition,
  payload: row.payload ?? ""
});

export class PgMigrationTargetRepository implements MigrationTargetRepository {
  constructor(
    private readonly pool: Pool,
    private readonly opts: { pendingMarker: string }
  ) {}

  async nextBatch(params: NextBatchParams): Promise<MigrationTarget[]> {
    return withTransaction(this.pool, async (client) => {
      const { rows } = await client.query<DefinitionRow>(
        `SELECT pd.id, pd.tenant_id, pd.name, pd.definition, pd.payload
           FROM process_definitions pd
           LEFT JOIN leases l ON l.resource_id = pd.id AND l.tenant_id = pd.tenant_id
          WHERE pd.is_deleted = false
            AND pd.definition IS NOT NULL
            AND pd.payload IS NOT NULL
            AND strpos(pd.payload, $2) > 0
            AND (
              l.resource_id IS NULL
              OR l.holder_id = $5
              OR (l.expires_at IS NOT NULL AND l.expires_at <= now())
            )
            AND ($3::text IS NULL OR pd.tenant_id = $3)
            AND ($4::text IS NULL OR pd.id > $4)
          ORDER BY pd.id ASC
          LIMIT $1
          FOR UPDATE OF pd SKIP LOCKED`,
        [params.batchSize, this.opts.pendingMarker, params.targetTenantId, params.cursorAfterId, params.allowedHolderId]
      );
      return rows.map(mapDefinitionRow);
    });
  }

  async backup(targets: MigrationTarget[]): Promise<void> {
    if (targets.length === 0) return;

    await withTransaction(this.pool, async (client) => {
      for (const target of targets) {
        await client.query(
          `INSERT INTO process_definitions_backup (id, tenant_id, name, definition, payload, backed_up_at)
           VALUES ($1, $2, $3, $4::jsonb, $5, now())
           ON CONFLICT (id, tenant_id) DO UPDATE
             SET name = EXCLUDED.name,
                 definition = EXCLUDED.definition,
                 payload = EXCLUDED.payload,
                 backed_up_at = now()`,
          [target.id, target.tenantId, target.name, JSON.stringify(target.definition), target.payload]
        );
      }
    });
  }

  async saveMigrated(target: MigrationTarget, migrated: MigratedDefinition): Promise<void> {
    const res = await this.pool.query(
      "UPDATE process_definitions SET definition = $3::jsonb, payload = $4 WHERE id = $1 AND tenant_id = $2",
      [target.id, target.tenantId, JSON.stringify(migrated.definition), migrated.payload]
    );
    if ((res.rowCount ?? 0) === 0) {
      throw new Error(`Process definition ${target.tenantId}/${target.id} not found`);
    }
  }
}
