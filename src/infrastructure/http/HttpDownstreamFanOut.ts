import { z } from "zod";
import type { NewWorkItemSpec, WorkItem } from "../../core/work-items/workItem.types";
import type { DownstreamFanOut } from "../../ports/DownstreamFanOut";
import type { HttpJsonClient } from "./httpJsonClient";

const fanOutResponseSchema = z.object({
  next: z
    .array(
      z.object({
        id: z.string().min(1).optional(),
        activityName: z.string().min(1),
        consumer: z.string().min(1).optional(),
        draft: z.unknown()
      })
    )
    .default([])
});

/**
 * Asks the process engine which activities follow a completed one:
 * `POST {base}/process-instances/{procInstId}/activities/{activityName}/complete`.
 */
export class HttpDownstreamFanOut implements DownstreamFanOut {
  constructor(private readonly client: HttpJsonClient) {}

  async onItemDone(item: WorkItem, result: Record<string, unknown>): Promise<NewWorkItemSpec[]> {
    const body = await this.client.postJson(["process-instances", item.procInstId, "activities", item.activityName, "complete"], {
      workItemId: item.id,
      tenantId: item.tenantId,
      result
    });

    const parsed = fanOutResponseSchema.safeParse(body ?? {});
    if (!parsed.success) {
      throw new Error(`Process engine returned an invalid fan-out response for work item ${item.id}`);
    }

    return parsed.data.next.map((spec) => {
      const next: NewWorkItemSpec = { activityName: spec.activityName, draft: spec.draft ?? {} };
      if (spec.id) next.id = spec.id;
      if (spec.consumer) next.consumer = spec.consumer;
      return next;
    });
  }
}
