import { InvalidDraftError } from "../../core/work-items/workItemDraft";
import type { ProcessingOutcome } from "../../core/work-items/workItemStateMachine";
import { toErrorMessage } from "../../shared/logging/log";
import { DeadlineExceededError } from "../../shared/timeout/runWithTimeout";

export type WorkItemFailureCode = "store_read_failed" | "store_write_failed";

export type WorkItemErrorContext = {
  phase: "poll" | "claim" | "start" | "complete" | "fan_out";
  workItemId?: string;
  tenantId?: string;
};

export class WorkItemFatalError extends Error {
  readonly code: WorkItemFailureCode;
  readonly context: WorkItemErrorContext;
  readonly cause?: unknown;

  constructor(args: { code: WorkItemFailureCode; message: string; context: WorkItemErrorContext; cause?: unknown }) {
    super(args.message);
    this.name = "WorkItemFatalError";
    this.code = args.code;
    this.context = args.context;
    this.cause = args.cause;
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

export class LeaseLostError extends Error {
  constructor(workItemId: string) {
    super(`Lease on work item ${workItemId} was taken over by another holder`);
    this.name = "LeaseLostError";
  }
}

const describeContext = (context: WorkItemErrorContext) =>
  [`phase=${context.phase}`, context.tenantId && `tenant=${context.tenantId}`, context.workItemId && `id=${context.workItemId}`]
    .filter(Boolean)
    .join(", ");

export const wrapStoreFailure = (
  reason: unknown,
  code: WorkItemFailureCode,
  context: WorkItemErrorContext
): WorkItemFatalError => {
  if (reason instanceof WorkItemFatalError) return reason;
  const message = `Work item store failure at ${describeContext(context)}: ${toErrorMessage(reason)}`;
  const cause = reason instanceof Error ? reason.cause ?? reason : reason;
  return new WorkItemFatalError({ code, message, context, cause });
};

/**
 * Turns anything thrown while validating or processing an item into a failure outcome.
 * Timeouts, schema errors and collaborator crashes all take the retry path.
 */
export const classifyProcessingFailure = (reason: unknown): ProcessingOutcome => {
  if (reason instanceof DeadlineExceededError) {
    return { kind: "failure", error: `processing timed out after ${reason.timeoutMs}ms`, retryable: true };
  }
  if (reason instanceof InvalidDraftError) {
    return { kind: "failure", error: reason.message, retryable: true };
  }
  if (reason instanceof LeaseLostError) {
    return { kind: "failure", error: reason.message, retryable: true };
  }
  return { kind: "failure", error: `processing failed: ${toErrorMessage(reason)}`, retryable: true };
};

export type PollCycleSummary = {
  candidates: number;
  claimed: number;
  reclaimed: number;
  conflicts: number;
  stale: number;
  skipped: number;
  deadLettered: number;
  fannedOut: number;
  failed: boolean;
};

export const createPollCycleTracker = () => {
  const counts = {
    candidates: 0,
    claimed: 0,
    reclaimed: 0,
    conflicts: 0,
    stale: 0,
    skipped: 0,
    deadLettered: 0,
    fannedOut: 0
  };
  let failed = false;

  return {
    addCandidates: (count: number) => {
      counts.candidates += count;
    },
    addClaimed: (reclaimed: boolean) => {
      counts.claimed += 1;
      if (reclaimed) counts.reclaimed += 1;
    },
    addConflict: () => {
      counts.conflicts += 1;
    },
    addStale: () => {
      counts.stale += 1;
    },
    addSkipped: () => {
      counts.skipped += 1;
    },
    addDeadLettered: () => {
      counts.deadLettered += 1;
    },
    addFannedOut: () => {
      counts.fannedOut += 1;
    },
    markFailed: () => {
      failed = true;
    },
    summary: (): PollCycleSummary => ({ ...counts, failed })
  };
};
