import { InvalidLeaseArgumentError, type AcquireResult } from "../../core/leases/Lease";
import type { WorkItem } from "../../core/work-items/workItem.types";
import { planClaim, type WorkItemTransition } from "../../core/work-items/workItemStateMachine";
import type { WorkItemRepository } from "../../ports/WorkItemRepository";
import { createLimiter, type Limiter } from "../../shared/concurrency/limiter";
import { logError, logInfo, logWarn, toErrorMessage } from "../../shared/logging/log";
import { sleep } from "../../shared/retry/retry";
import type { LeaseManager } from "../lease-manager/leaseManager";
import {
  createPollCycleTracker,
  WorkItemFatalError,
  wrapStoreFailure,
  type PollCycleSummary
} from "./dispatch.error-handler";
import type { Dispatcher } from "./dispatcher";
import type { StateTransitioner } from "./stateTransitioner";
import { toRetryPolicy, type WorkerConfig } from "./worker.config";

export type PollerDeps = {
  repo: WorkItemRepository;
  leases: LeaseManager;
  dispatcher: Dispatcher;
  transitioner: StateTransitioner;
  config: WorkerConfig;
};

export type PollerStatus = {
  holderId: string;
  running: boolean;
  inFlight: number;
  lastCycleAt?: string;
  lastCycle?: PollCycleSummary;
};

type Tracker = ReturnType<typeof createPollCycleTracker>;

/**
 * Per-replica claim loop. Each cycle completes pending fan-outs, then claims up to
 * `min(batchSize, free slots)` items in creation order and dispatches them without
 * waiting. A failed cycle is logged and the loop carries on at the next interval.
 */
export class Poller {
  private readonly limit: Limiter;
  private readonly inFlight = new Set<Promise<void>>();
  private running = false;
  private loop?: Promise<void>;
  private wake?: AbortController;
  private lastCycle?: PollCycleSummary;
  private lastCycleAt?: Date;

  constructor(private readonly deps: PollerDeps) {
    this.limit = createLimiter(deps.config.maxInFlight);
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    this.loop = this.runLoop();
  }

  /** Stops polling and waits for in-flight dispatches to settle. */
  async stop(): Promise<void> {
    this.running = false;
    this.wake?.abort();
    await this.loop;
    this.loop = undefined;
    await this.drain();
  }

  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  status(): PollerStatus {
    return {
      holderId: this.deps.config.holderId,
      running: this.running,
      inFlight: this.inFlight.size,
      lastCycleAt: this.lastCycleAt?.toISOString(),
      lastCycle: this.lastCycle
    };
  }

  async runCycle(): Promise<PollCycleSummary> {
    const { repo, config } = this.deps;
    const tracker = createPollCycleTracker();

    try {
      await this.sweepPendingFanOut(tracker);

      const freeSlots = config.maxInFlight - (this.limit.activeCount() + this.limit.pendingCount());
      const limit = Math.min(config.batchSize, freeSlots);
      if (limit > 0) {
        let candidates: WorkItem[];
        try {
          candidates = await repo.findClaimable({ limit });
        } catch (err) {
          throw wrapStoreFailure(err, "store_read_failed", { phase: "poll" });
        }
        tracker.addCandidates(candidates.length);

        // A conflict is final for this cycle; nothing is retried until the next one.
        for (const candidate of candidates) {
          try {
            await this.tryClaim(candidate, tracker);
          } catch (err) {
            // Store failures end the cycle; anything else only costs this candidate.
            if (err instanceof WorkItemFatalError) throw err;
            tracker.addSkipped();
            logWarn({
              event: "poll.candidate_skipped",
              workItemId: candidate.id,
              tenantId: candidate.tenantId,
              reason: toErrorMessage(err)
            });
          }
        }
      }
    } catch (err) {
      tracker.markFailed();
      logError({ event: "poll.cycle_failed", holderId: config.holderId, reason: toErrorMessage(err) });
    }

    const summary = tracker.summary();
    this.lastCycle = summary;
    this.lastCycleAt = new Date();
    logInfo({ event: "poll.cycle", holderId: config.holderId, inFlight: this.inFlight.size, ...summary });
    return summary;
  }

  private async runLoop(): Promise<void> {
    while (this.running) {
      await this.runCycle();
      if (!this.running) break;
      this.wake = new AbortController();
      await sleep(this.deps.config.pollIntervalMs, this.wake.signal);
    }
  }

  private async sweepPendingFanOut(tracker: Tracker): Promise<void> {
    const { repo, transitioner, config } = this.deps;
    let pending: WorkItem[];
    try {
      pending = await repo.findPendingFanOut({ limit: config.batchSize });
    } catch (err) {
      throw wrapStoreFailure(err, "store_read_failed", { phase: "fan_out" });
    }

    for (const item of pending) {
      const created = await transitioner.fanOutOnce(item);
      if (created !== null) tracker.addFannedOut();
    }
  }

  private async tryClaim(candidate: WorkItem, tracker: Tracker): Promise<void> {
    const { repo, leases, transitioner, config } = this.deps;
    const ref = { id: candidate.id, tenantId: candidate.tenantId };

    const transition: WorkItemTransition = planClaim(candidate, config.holderId, toRetryPolicy(config));

    let acquired: AcquireResult;
    try {
      acquired = await leases.acquire(candidate.id, candidate.tenantId, config.holderId, config.leaseTtlMs);
    } catch (err) {
      if (err instanceof InvalidLeaseArgumentError) throw err;
      throw wrapStoreFailure(err, "store_write_failed", { phase: "claim", workItemId: ref.id, tenantId: ref.tenantId });
    }
    if (acquired.kind === "conflict") {
      tracker.addConflict();
      return;
    }

    let claimed: WorkItem | null;
    try {
      claimed = await repo.applyTransition(ref, transition, config.holderId);
    } catch (err) {
      await transitioner.releaseLease(ref);
      throw wrapStoreFailure(err, "store_write_failed", { phase: "claim", workItemId: ref.id, tenantId: ref.tenantId });
    }

    if (!claimed) {
      // Status moved on between the scan and the claim.
      tracker.addStale();
      await transitioner.releaseLease(ref);
      return;
    }

    if (claimed.status === "DEAD_LETTER") {
      tracker.addDeadLettered();
      logWarn({
        event: "dispatch.completed",
        workItemId: claimed.id,
        tenantId: claimed.tenantId,
        outcome: "dead_letter",
        attemptCount: claimed.attemptCount,
        error: claimed.lastError
      });
      await transitioner.releaseLease(ref);
      return;
    }

    tracker.addClaimed(candidate.status === "PROCESSING");
    this.launch(claimed);
  }

  private launch(item: WorkItem): void {
    const task: Promise<void> = this.limit(() => this.deps.dispatcher.dispatch(item))
      .then(
        () => undefined,
        (err: unknown) => {
          logError({
            event: "dispatch.failed",
            workItemId: item.id,
            tenantId: item.tenantId,
            reason: toErrorMessage(err)
          });
        }
      )
      .finally(() => {
        this.inFlight.delete(task);
      });
    this.inFlight.add(task);
  }
}
