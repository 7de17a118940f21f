import type { WorkItemDraft } from "./workItemDraft";

export const workItemStatuses = [
  "SUBMITTED",
  "CLAIMED",
  "PROCESSING",
  "DONE",
  "RETRY_PENDING",
  "FAILED",
  "DEAD_LETTER"
] as const;

export type WorkItemStatus = (typeof workItemStatuses)[number];

export type WorkItemRef = {
  id: string;
  tenantId: string;
};

export type WorkItem = WorkItemRef & {
  procInstId: string;
  activityName: string;
  consumer?: string;
  status: WorkItemStatus;
  draft: unknown;
  result?: Record<string, unknown>;
  attemptCount: number;
  lastError?: string;
  retryEligibleAt?: Date;
  fannedOutAt?: Date;
  createdAt: Date;
  updatedAt: Date;
};

/**
 * A work item whose draft passed schema validation.
 */
export type ValidatedWorkItem = Omit<WorkItem, "draft"> & { draft: WorkItemDraft };

/**
 * Shape returned by the downstream fan-out collaborator for activities that became ready.
 */
export type NewWorkItemSpec = {
  id?: string;
  activityName: string;
  consumer?: string;
  draft: unknown;
};

export const isWorkItemStatus = (value: unknown): value is WorkItemStatus =>
  workItemStatuses.some((status) => status === value);
