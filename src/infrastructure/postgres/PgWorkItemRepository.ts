import { randomUUID } from "crypto";
import type { Pool, PoolClient } from "pg";
import type { NewWorkItemSpec, WorkItem, WorkItemRef } from "../../core/work-items/workItem.types";
import { isWorkItemStatus } from "../../core/work-items/workItem.types";
import type { WorkItemTransition } from "../../core/work-items/workItemStateMachine";
import type { FanOutHandler, WorkItemRepository } from "../../ports/WorkItemRepository";
import { withTransaction } from "./PgPoolFactory";

export type WorkItemRow = {
  id: string;
  tenant_id: string;
  proc_inst_id: string;
  activity_name: string;
  consumer: string | null;
  status: string;
  draft: unknown;
  result: Record<string, unknown> | null;
  attempt_count: number;
  last_error: string | null;
  retry_eligible_at: Date | null;
  fanned_out_at: Date | null;
  created_at: Date;
  updated_at: Date;
};

export const mapWorkItemRow = (row: WorkItemRow): WorkItem => {
  if (!isWorkItemStatus(row.status)) {
    throw new Error(`Work item ${row.tenant_id}/${row.id} has unknown status ${row.status}`);
  }

  const item: WorkItem = {
    id: row.id,
    tenantId: row.tenant_id,
    procInstId: row.proc_inst_id,
    activityName: row.activity_name,
    status: row.status,
    draft: row.draft,
    attemptCount: row.attempt_count,
    createdAt: row.created_at,
    updatedAt: row.updated_at
  };
  if (row.consumer != null) item.consumer = row.consumer;
  if (row.result != null) item.result = row.result;
  if (row.last_error != null) item.lastError = row.last_error;
  if (row.retry_eligible_at != null) item.retryEligibleAt = row.retry_eligible_at;
  if (row.fanned_out_at != null) item.fannedOutAt = row.fanned_out_at;
  return item;
};

// A lease row that is absent or expired leaves the item free for anyone to claim.
const NO_LIVE_LEASE = "(l.resource_id IS NULL OR (l.expires_at IS NOT NULL AND l.expires_at <= now()))";

export class PgWorkItemRepository implements WorkItemRepository {
  constructor(private readonly pool: Pool) {}

  async findClaimable(params: { limit: number }): Promise<WorkItem[]> {
    if (params.limit < 1) return [];

    const { rows } = await this.pool.query<WorkItemRow>(
      `SELECT w.*
         FROM work_items w
         LEFT JOIN leases l ON l.resource_id = w.id AND l.tenant_id = w.tenant_id
        WHERE ${NO_LIVE_LEASE}
          AND (
            w.status IN ('SUBMITTED', 'CLAIMED', 'PROCESSING')
            OR (w.status = 'RETRY_PENDING' AND (w.retry_eligible_at IS NULL OR w.retry_eligible_at <= now()))
          )
        ORDER BY w.created_at ASC, w.id ASC
        LIMIT $1`,
      [params.limit]
    );
    return rows.map(mapWorkItemRow);
  }

  async applyTransition(ref: WorkItemRef, transition: WorkItemTransition, holderId: string): Promise<WorkItem | null> {
    const { rows } = await this.pool.query<WorkItemRow>(
      `UPDATE work_items w
          SET status = $3,
              attempt_count = $4,
              last_error = $5,
              retry_eligible_at = $6,
              consumer = COALESCE($7, w.consumer),
              result = COALESCE($8::jsonb, w.result),
              updated_at = now()
        WHERE w.id = $1
          AND w.tenant_id = $2
          AND w.status = $9
          AND EXISTS (
            SELECT 1 FROM leases l
             WHERE l.resource_id = w.id
               AND l.tenant_id = w.tenant_id
               AND l.holder_id = $10
               AND (l.expires_at IS NULL OR l.expires_at > now())
          )
        RETURNING w.*`,
      [
        ref.id,
        ref.tenantId,
        transition.to,
        transition.attemptCount,
        transition.lastError,
        transition.retryEligibleAt,
        transition.consumer ?? null,
        transition.result === undefined ? null : JSON.stringify(transition.result),
        transition.from,
        holderId
      ]
    );
    return rows[0] ? mapWorkItemRow(rows[0]) : null;
  }

  async findPendingFanOut(params: { limit: number }): Promise<WorkItem[]> {
    const { rows } = await this.pool.query<WorkItemRow>(
      `SELECT * FROM work_items
        WHERE status = 'DONE' AND fanned_out_at IS NULL
        ORDER BY updated_at ASC
        LIMIT $1`,
      [params.limit]
    );
    return rows.map(mapWorkItemRow);
  }

  async completeFanOut(ref: WorkItemRef, handler: FanOutHandler): Promise<WorkItem[] | null> {
    return withTransaction(this.pool, async (client) => {
      // SKIP LOCKED: a concurrent fan-out of the same item sees no row instead of waiting.
      const locked = await client.query<WorkItemRow>(
        `SELECT * FROM work_items
          WHERE id = $1 AND tenant_id = $2 AND status = 'DONE' AND fanned_out_at IS NULL
          FOR UPDATE SKIP LOCKED`,
        [ref.id, ref.tenantId]
      );
      const row = locked.rows[0];
      if (!row) return null;

      const parent = mapWorkItemRow(row);
      const specs = await handler(parent);
      const created: WorkItem[] = [];
      for (const spec of specs) {
        const inserted = await this.insertSubmitted(client, parent, spec);
        if (inserted) created.push(inserted);
      }

      await client.query(
        "UPDATE work_items SET fanned_out_at = now(), updated_at = now() WHERE id = $1 AND tenant_id = $2",
        [ref.id, ref.tenantId]
      );
      return created;
    });
  }

  private async insertSubmitted(client: PoolClient, parent: WorkItem, spec: NewWorkItemSpec): Promise<WorkItem | null> {
    const { rows } = await client.query<WorkItemRow>(
      `INSERT INTO work_items (id, tenant_id, proc_inst_id, activity_name, consumer, status, draft, attempt_count)
       VALUES ($1, $2, $3, $4, $5, 'SUBMITTED', $6::jsonb, 0)
       ON CONFLICT (id, tenant_id) DO NOTHING
       RETURNING *`,
      [
        spec.id ?? randomUUID(),
        parent.tenantId,
        parent.procInstId,
        spec.activityName,
        spec.consumer ?? null,
        JSON.stringify(spec.draft ?? {})
      ]
    );
    return rows[0] ? mapWorkItemRow(rows[0]) : null;
  }
}
