import { NotHolderError } from "../../core/leases/Lease";
import type { WorkItemRef } from "../../core/work-items/workItem.types";
import { logWarn, toErrorMessage } from "../../shared/logging/log";
import type { LeaseManager } from "../lease-manager/leaseManager";
import { LeaseLostError } from "./dispatch.error-handler";

export type LeaseHeartbeat = {
  /** Aborts once another holder owns the lease. */
  signal: AbortSignal;
  stop: () => Promise<void>;
};

export const startLeaseHeartbeat = (opts: {
  leases: LeaseManager;
  ref: WorkItemRef;
  holderId: string;
  ttlMs: number;
  intervalMs: number;
}): LeaseHeartbeat => {
  const { leases, ref, holderId, ttlMs, intervalMs } = opts;
  const controller = new AbortController();
  let inFlight: Promise<void> | undefined;

  const renewOnce = async () => {
    try {
      await leases.renew(ref.id, ref.tenantId, holderId, ttlMs);
    } catch (err) {
      if (err instanceof NotHolderError) {
        clearInterval(timer);
        logWarn({ event: "lease.lost", workItemId: ref.id, tenantId: ref.tenantId, holderId });
        controller.abort(new LeaseLostError(ref.id));
        return;
      }
      // Keep trying; if the store stays unreachable the lease expires and another replica recovers the item.
      logWarn({
        event: "lease.renew_failed",
        workItemId: ref.id,
        tenantId: ref.tenantId,
        holderId,
        reason: toErrorMessage(err)
      });
    }
  };

  const timer = setInterval(() => {
    if (inFlight || controller.signal.aborted) return;
    inFlight = renewOnce().finally(() => {
      inFlight = undefined;
    });
  }, intervalMs);

  return {
    signal: controller.signal,
    stop: async () => {
      clearInterval(timer);
      await inFlight;
    }
  };
};
