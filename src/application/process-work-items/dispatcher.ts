import type { WorkItem, WorkItemRef } from "../../core/work-items/workItem.types";
import { parseWorkItemDraft } from "../../core/work-items/workItemDraft";
import type { ProcessingOutcome } from "../../core/work-items/workItemStateMachine";
import { planStartProcessing } from "../../core/work-items/workItemStateMachine";
import type { WorkItemProcessor } from "../../ports/WorkItemProcessor";
import type { WorkItemRepository } from "../../ports/WorkItemRepository";
import { logWarn } from "../../shared/logging/log";
import { runWithTimeout } from "../../shared/timeout/runWithTimeout";
import type { LeaseManager } from "../lease-manager/leaseManager";
import { classifyProcessingFailure, wrapStoreFailure } from "./dispatch.error-handler";
import { startLeaseHeartbeat } from "./leaseHeartbeat";
import type { DispatchReport, StateTransitioner } from "./stateTransitioner";
import type { WorkerConfig } from "./worker.config";

export type DispatcherDeps = {
  repo: WorkItemRepository;
  leases: LeaseManager;
  processor: WorkItemProcessor;
  transitioner: StateTransitioner;
  config: Pick<WorkerConfig, "holderId" | "leaseTtlMs" | "leaseRenewIntervalMs" | "dispatchTimeoutMs">;
};

/**
 * Runs one claimed work item through the processing collaborator:
 * CLAIMED -> PROCESSING, invoke under a hard timeout while heartbeating the lease,
 * then hand the outcome to the state transitioner.
 */
export class Dispatcher {
  constructor(private readonly deps: DispatcherDeps) {}

  async dispatch(claimed: WorkItem): Promise<DispatchReport> {
    const { repo, transitioner, config } = this.deps;
    const ref: WorkItemRef = { id: claimed.id, tenantId: claimed.tenantId };

    let processing: WorkItem | null;
    try {
      processing = await repo.applyTransition(ref, planStartProcessing(claimed), config.holderId);
    } catch (err) {
      await transitioner.releaseLease(ref);
      throw wrapStoreFailure(err, "store_write_failed", { phase: "start", workItemId: ref.id, tenantId: ref.tenantId });
    }

    if (!processing) {
      logWarn({ event: "dispatch.lease_lost", workItemId: ref.id, tenantId: ref.tenantId, holderId: config.holderId, status: "PROCESSING" });
      await transitioner.releaseLease(ref);
      return { workItemId: ref.id, tenantId: ref.tenantId, outcome: "lease_lost" };
    }

    const outcome = await this.process(processing);
    return transitioner.apply(processing, outcome);
  }

  private async process(item: WorkItem): Promise<ProcessingOutcome> {
    const { leases, processor, config } = this.deps;
    const heartbeat = startLeaseHeartbeat({
      leases,
      ref: { id: item.id, tenantId: item.tenantId },
      holderId: config.holderId,
      ttlMs: config.leaseTtlMs,
      intervalMs: config.leaseRenewIntervalMs
    });

    try {
      const draft = parseWorkItemDraft(item.draft);
      const result = await runWithTimeout(
        (signal, deadline) => processor.process({ ...item, draft }, { signal, deadline }),
        config.dispatchTimeoutMs,
        heartbeat.signal
      );

      if (result.status === "success") {
        return { kind: "success", result: result.result ?? {} };
      }
      return { kind: "failure", error: result.error, retryable: result.retryable ?? true };
    } catch (err) {
      return classifyProcessingFailure(err);
    } finally {
      await heartbeat.stop();
    }
  }
}
