import type { Pool } from "pg";
import type { Lease, LeaseKey } from "../../core/leases/Lease";
import type { LeaseStore } from "../../ports/LeaseStore";

export type LeaseRow = {
  resource_id: string;
  tenant_id: string;
  holder_id: string;
  acquired_at: Date;
  expires_at: Date | null;
};

const LEASE_COLUMNS = "resource_id, tenant_id, holder_id, acquired_at, expires_at";
const EXPIRES_AT_FROM_TTL = "CASE WHEN $4::bigint IS NULL THEN NULL ELSE now() + $4::bigint * interval '1 millisecond' END";

export const mapLeaseRow = (row: LeaseRow): Lease => ({
  resourceId: row.resource_id,
  tenantId: row.tenant_id,
  holderId: row.holder_id,
  acquiredAt: row.acquired_at,
  expiresAt: row.expires_at
});

/**
 * Leases on Postgres. Time is always the database clock (`now()`), so replicas never
 * compare their own clocks against each other.
 */
export class PgLeaseStore implements LeaseStore {
  constructor(private readonly pool: Pool) {}

  async tryAcquire(key: LeaseKey, holderId: string, ttlMs: number | null): Promise<Lease | null> {
    // The upsert only overwrites a row held by the caller or already expired; under a
    // concurrent race the loser's ON CONFLICT branch sees the winner's live row and returns nothing.
    const { rows } = await this.pool.query<LeaseRow>(
      `INSERT INTO leases (resource_id, tenant_id, holder_id, acquired_at, expires_at)
       VALUES ($1, $2, $3, now(), ${EXPIRES_AT_FROM_TTL})
       ON CONFLICT (resource_id, tenant_id) DO UPDATE
         SET holder_id = EXCLUDED.holder_id,
             acquired_at = EXCLUDED.acquired_at,
             expires_at = EXCLUDED.expires_at
         WHERE leases.holder_id = EXCLUDED.holder_id
            OR (leases.expires_at IS NOT NULL AND leases.expires_at <= now())
       RETURNING ${LEASE_COLUMNS}`,
      [key.resourceId, key.tenantId, holderId, ttlMs]
    );
    return rows[0] ? mapLeaseRow(rows[0]) : null;
  }

  async extend(key: LeaseKey, holderId: string, ttlMs: number | null): Promise<Lease | null> {
    const { rows } = await this.pool.query<LeaseRow>(
      `UPDATE leases
          SET expires_at = ${EXPIRES_AT_FROM_TTL}
        WHERE resource_id = $1 AND tenant_id = $2 AND holder_id = $3
        RETURNING ${LEASE_COLUMNS}`,
      [key.resourceId, key.tenantId, holderId, ttlMs]
    );
    return rows[0] ? mapLeaseRow(rows[0]) : null;
  }

  async remove(key: LeaseKey, holderId: string): Promise<boolean> {
    const res = await this.pool.query(
      "DELETE FROM leases WHERE resource_id = $1 AND tenant_id = $2 AND holder_id = $3",
      [key.resourceId, key.tenantId, holderId]
    );
    return (res.rowCount ?? 0) > 0;
  }
}
