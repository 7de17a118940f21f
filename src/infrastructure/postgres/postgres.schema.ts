/**
 * Tables owned by the claim service:
 * - leases: one row per (resource_id, tenant_id); the unique key is the only mutual exclusion
 * - work_items: FIFO scan on created_at for claimable statuses
 * - process_definitions(+_backup): migration targets, cursor-ordered by id
 */
export const schemaStatements: readonly string[] = [
  `CREATE TABLE IF NOT EXISTS leases (
    resource_id TEXT NOT NULL,
    tenant_id TEXT NOT NULL,
    holder_id TEXT NOT NULL,
    acquired_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    expires_at TIMESTAMPTZ NULL,
    PRIMARY KEY (resource_id, tenant_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_leases_expires_at ON leases (expires_at)`,
  `CREATE TABLE IF NOT EXISTS work_items (
    id TEXT NOT NULL,
    tenant_id TEXT NOT NULL,
    proc_inst_id TEXT NOT NULL,
    activity_name TEXT NOT NULL,
    consumer TEXT NULL,
    status TEXT NOT NULL CHECK (status IN ('SUBMITTED','CLAIMED','PROCESSING','DONE','RETRY_PENDING','FAILED','DEAD_LETTER')),
    draft JSONB NOT NULL DEFAULT '{}'::jsonb,
    result JSONB NULL,
    attempt_count INTEGER NOT NULL DEFAULT 0 CHECK (attempt_count >= 0),
    last_error TEXT NULL,
    retry_eligible_at TIMESTAMPTZ NULL,
    fanned_out_at TIMESTAMPTZ NULL,
    created_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    updated_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (id, tenant_id)
  )`,
  `CREATE INDEX IF NOT EXISTS idx_work_items_status_created_at ON work_items (status, created_at)`,
  `CREATE INDEX IF NOT EXISTS idx_work_items_pending_fan_out ON work_items (updated_at) WHERE status = 'DONE' AND fanned_out_at IS NULL`,
  `CREATE TABLE IF NOT EXISTS process_definitions (
    id TEXT NOT NULL,
    tenant_id TEXT NOT NULL,
    name TEXT NOT NULL DEFAULT '',
    definition JSONB NULL,
    payload TEXT NULL,
    is_deleted BOOLEAN NOT NULL DEFAULT false,
    PRIMARY KEY (id, tenant_id)
  )`,
  // The migration cursor pages on id alone, so ids must not repeat across tenants.
  `CREATE UNIQUE INDEX IF NOT EXISTS idx_process_definitions_id ON process_definitions (id)`,
  `CREATE TABLE IF NOT EXISTS process_definitions_backup (
    id TEXT NOT NULL,
    tenant_id TEXT NOT NULL,
    name TEXT NOT NULL DEFAULT '',
    definition JSONB NULL,
    payload TEXT NULL,
    backed_up_at TIMESTAMPTZ NOT NULL DEFAULT now(),
    PRIMARY KEY (id, tenant_id)
  )`
];
