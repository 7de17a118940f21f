import { computeBackoffDelay } from "../../shared/retry/retry";
import type { WorkItem, WorkItemStatus } from "./workItem.types";

export type RetryPolicy = {
  maxAttempts: number;
  backoffBaseMs: number;
  backoffMaxMs: number;
};

export type ProcessingOutcome =
  | { kind: "success"; result: Record<string, unknown> }
  | { kind: "failure"; error: string; retryable: boolean };

/**
 * Fully specified status change, applied by the store as one conditional update
 * guarded on `from` and on the caller holding a live lease.
 */
export type WorkItemTransition = {
  from: WorkItemStatus;
  to: WorkItemStatus;
  attemptCount: number;
  lastError: string | null;
  retryEligibleAt: Date | null;
  consumer?: string;
  result?: Record<string, unknown>;
};

export const claimableStatuses: readonly WorkItemStatus[] = ["SUBMITTED", "RETRY_PENDING"];

// Statuses that only a live lease holder may occupy; without one the item is orphaned.
export const leasedStatuses: readonly WorkItemStatus[] = ["CLAIMED", "PROCESSING"];

export const terminalStatuses: readonly WorkItemStatus[] = ["DONE", "FAILED", "DEAD_LETTER"];

const allowedTransitions: Record<WorkItemStatus, readonly WorkItemStatus[]> = {
  SUBMITTED: ["CLAIMED"],
  RETRY_PENDING: ["CLAIMED"],
  CLAIMED: ["PROCESSING", "CLAIMED"],
  PROCESSING: ["DONE", "RETRY_PENDING", "DEAD_LETTER", "FAILED", "CLAIMED"],
  DONE: [],
  FAILED: [],
  DEAD_LETTER: []
};

export const ORPHANED_PROCESSING_ERROR = "lease expired during processing";

export class InvalidTransitionError extends Error {
  readonly from: WorkItemStatus;
  readonly to: WorkItemStatus;

  constructor(from: WorkItemStatus, to: WorkItemStatus) {
    super(`Invalid work item transition ${from} -> ${to}`);
    this.name = "InvalidTransitionError";
    this.from = from;
    this.to = to;
  }
}

export const canTransition = (from: WorkItemStatus, to: WorkItemStatus): boolean =>
  allowedTransitions[from].includes(to);

export const isTerminalStatus = (status: WorkItemStatus): boolean => terminalStatuses.includes(status);

const assertTransition = (from: WorkItemStatus, to: WorkItemStatus) => {
  if (!canTransition(from, to)) {
    throw new InvalidTransitionError(from, to);
  }
};

export const computeRetryDelayMs = (attemptCountBeforeFailure: number, policy: RetryPolicy): number =>
  computeBackoffDelay(attemptCountBeforeFailure, {
    minDelayMs: policy.backoffBaseMs,
    maxDelayMs: policy.backoffMaxMs
  });

const planFailure = (
  item: Pick<WorkItem, "status" | "attemptCount">,
  error: string,
  retryable: boolean,
  policy: RetryPolicy,
  now: Date
): WorkItemTransition => {
  const attemptCount = item.attemptCount + 1;

  // Beyond the retry policy: a failure the collaborator marks non-retryable ends the
  // item as FAILED without spending the remaining attempts.
  if (!retryable) {
    assertTransition(item.status, "FAILED");
    return { from: item.status, to: "FAILED", attemptCount, lastError: error, retryEligibleAt: null };
  }

  if (attemptCount >= policy.maxAttempts) {
    assertTransition(item.status, "DEAD_LETTER");
    return { from: item.status, to: "DEAD_LETTER", attemptCount, lastError: error, retryEligibleAt: null };
  }

  assertTransition(item.status, "RETRY_PENDING");
  return {
    from: item.status,
    to: "RETRY_PENDING",
    attemptCount,
    lastError: error,
    retryEligibleAt: new Date(now.getTime() + computeRetryDelayMs(item.attemptCount, policy))
  };
};

/**
 * Transition for a claim by `holderId`. Reclaiming an orphaned PROCESSING item
 * charges the interrupted attempt against the retry budget.
 */
export const planClaim = (
  item: Pick<WorkItem, "status" | "attemptCount" | "lastError">,
  holderId: string,
  policy: RetryPolicy
): WorkItemTransition => {
  if (item.status === "PROCESSING") {
    const attemptCount = item.attemptCount + 1;
    if (attemptCount >= policy.maxAttempts) {
      return {
        from: "PROCESSING",
        to: "DEAD_LETTER",
        attemptCount,
        lastError: ORPHANED_PROCESSING_ERROR,
        retryEligibleAt: null
      };
    }
    return {
      from: "PROCESSING",
      to: "CLAIMED",
      attemptCount,
      lastError: ORPHANED_PROCESSING_ERROR,
      retryEligibleAt: null,
      consumer: holderId
    };
  }

  assertTransition(item.status, "CLAIMED");
  return {
    from: item.status,
    to: "CLAIMED",
    attemptCount: item.attemptCount,
    lastError: item.lastError ?? null,
    retryEligibleAt: null,
    consumer: holderId
  };
};

export const planStartProcessing = (item: Pick<WorkItem, "status" | "attemptCount" | "lastError">): WorkItemTransition => {
  assertTransition(item.status, "PROCESSING");
  return {
    from: item.status,
    to: "PROCESSING",
    attemptCount: item.attemptCount,
    lastError: item.lastError ?? null,
    retryEligibleAt: null
  };
};

export const planOutcome = (
  item: Pick<WorkItem, "status" | "attemptCount">,
  outcome: ProcessingOutcome,
  policy: RetryPolicy,
  now: Date
): WorkItemTransition => {
  if (outcome.kind === "success") {
    assertTransition(item.status, "DONE");
    return {
      from: item.status,
      to: "DONE",
      attemptCount: item.attemptCount,
      lastError: null,
      retryEligibleAt: null,
      result: outcome.result
    };
  }

  return planFailure(item, outcome.error, outcome.retryable, policy, now);
};
