import type { NewWorkItemSpec, WorkItem, WorkItemRef } from "../core/work-items/workItem.types";
import type { WorkItemTransition } from "../core/work-items/workItemStateMachine";

export type FanOutHandler = (item: WorkItem) => Promise<NewWorkItemSpec[]>;

export interface WorkItemRepository {
  /**
   * Up to `limit` items ordered by `createdAt` ascending: SUBMITTED items, RETRY_PENDING
   * items whose retry time has passed, and CLAIMED/PROCESSING items without a live lease.
   */
  findClaimable(params: { limit: number }): Promise<WorkItem[]>;

  /**
   * Applies `transition` only if the item is still in `transition.from` and `holderId`
   * holds a live lease on it. Returns the updated item, or null when the guard failed.
   */
  applyTransition(ref: WorkItemRef, transition: WorkItemTransition, holderId: string): Promise<WorkItem | null>;

  /** DONE items whose downstream fan-out has not been committed yet. */
  findPendingFanOut(params: { limit: number }): Promise<WorkItem[]>;

  /**
   * In one transaction: locks the item, checks it is DONE and not fanned out yet, calls
   * `handler`, inserts the returned items as SUBMITTED and stamps `fannedOutAt`.
   * Returns the created items, or null when the item was not pending fan-out.
   */
  completeFanOut(ref: WorkItemRef, handler: FanOutHandler): Promise<WorkItem[] | null>;
}
