import type { NewWorkItemSpec, WorkItem } from "../core/work-items/workItem.types";

/**
 * Process-definition side: decides which activities become ready once `item` is done.
 */
export interface DownstreamFanOut {
  onItemDone(item: WorkItem, result: Record<string, unknown>): Promise<NewWorkItemSpec[]>;
}
