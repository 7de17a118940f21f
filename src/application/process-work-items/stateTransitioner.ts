import type { WorkItem, WorkItemRef, WorkItemStatus } from "../../core/work-items/workItem.types";
import type { ProcessingOutcome, RetryPolicy } from "../../core/work-items/workItemStateMachine";
import { planOutcome } from "../../core/work-items/workItemStateMachine";
import type { DownstreamFanOut } from "../../ports/DownstreamFanOut";
import type { WorkItemRepository } from "../../ports/WorkItemRepository";
import { logError, logInfo, logWarn, toErrorMessage } from "../../shared/logging/log";
import type { LeaseManager } from "../lease-manager/leaseManager";
import { wrapStoreFailure } from "./dispatch.error-handler";

export type DispatchOutcome = "done" | "retry_pending" | "dead_letter" | "failed" | "lease_lost";

export type DispatchReport = {
  workItemId: string;
  tenantId: string;
  outcome: DispatchOutcome;
  attemptCount?: number;
  error?: string;
};

const outcomeByStatus: Partial<Record<WorkItemStatus, DispatchOutcome>> = {
  DONE: "done",
  RETRY_PENDING: "retry_pending",
  DEAD_LETTER: "dead_letter",
  FAILED: "failed"
};

export type StateTransitionerDeps = {
  repo: WorkItemRepository;
  leases: LeaseManager;
  fanOut: DownstreamFanOut;
  holderId: string;
  retryPolicy: RetryPolicy;
  now?: () => Date;
};

/**
 * Persists the outcome of a processing attempt, releases the lease, and fans out
 * downstream work once a DONE transition has been committed.
 */
export class StateTransitioner {
  private readonly now: () => Date;

  constructor(private readonly deps: StateTransitionerDeps) {
    this.now = deps.now ?? (() => new Date());
  }

  async apply(item: WorkItem, outcome: ProcessingOutcome): Promise<DispatchReport> {
    const { repo, holderId, retryPolicy } = this.deps;
    const ref: WorkItemRef = { id: item.id, tenantId: item.tenantId };
    const transition = planOutcome(item, outcome, retryPolicy, this.now());

    let updated: WorkItem | null;
    try {
      updated = await repo.applyTransition(ref, transition, holderId);
    } catch (err) {
      // The lease is left to expire so a healthy replica can recover the item.
      throw wrapStoreFailure(err, "store_write_failed", { phase: "complete", workItemId: item.id, tenantId: item.tenantId });
    }

    if (!updated) {
      logWarn({ event: "dispatch.lease_lost", workItemId: item.id, tenantId: item.tenantId, holderId, status: transition.to });
      return { workItemId: item.id, tenantId: item.tenantId, outcome: "lease_lost" };
    }

    await this.releaseLease(ref);

    if (updated.status === "DONE") {
      await this.fanOutOnce(updated);
    }

    const report: DispatchReport = {
      workItemId: updated.id,
      tenantId: updated.tenantId,
      outcome: outcomeByStatus[updated.status] ?? "lease_lost",
      attemptCount: updated.attemptCount
    };
    if (updated.status !== "DONE" && updated.lastError) {
      report.error = updated.lastError;
    }

    const log = { event: "dispatch.completed", ...report, retryEligibleAt: updated.retryEligibleAt?.toISOString() };
    if (updated.status === "DEAD_LETTER" || updated.status === "FAILED") {
      logWarn(log);
    } else {
      logInfo(log);
    }
    return report;
  }

  /**
   * Commits downstream fan-out for a DONE item at most once; the store re-checks the
   * durable DONE status and fan-out marker under a row lock before calling out.
   * Returns the number of created items, or null when nothing was pending or it failed.
   */
  async fanOutOnce(item: WorkItemRef): Promise<number | null> {
    const { repo, fanOut } = this.deps;
    try {
      const created = await repo.completeFanOut(item, (locked) => fanOut.onItemDone(locked, locked.result ?? {}));
      if (created === null) return null;
      logInfo({ event: "fan_out.completed", workItemId: item.id, tenantId: item.tenantId, created: created.length });
      return created.length;
    } catch (err) {
      // Left pending; the poller's fan-out sweep retries it.
      logError({ event: "fan_out.failed", workItemId: item.id, tenantId: item.tenantId, reason: toErrorMessage(err) });
      return null;
    }
  }

  async releaseLease(ref: WorkItemRef): Promise<void> {
    try {
      await this.deps.leases.release(ref.id, ref.tenantId, this.deps.holderId);
    } catch (err) {
      logWarn({ event: "lease.release_failed", workItemId: ref.id, tenantId: ref.tenantId, reason: toErrorMessage(err) });
    }
  }
}
